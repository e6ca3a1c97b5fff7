export {
  decodeHeader,
  decodeString,
  decodeList,
  decodeListOfSmallStrings,
  encodedLength,
  fragmentWindow,
  MAX_LENGTH_OF_LENGTH,
  MAX_SHORT_PAYLOAD,
  type RlpKind,
  type RlpHeader,
  type RlpFragment,
  type RlpList,
} from "./decode";
