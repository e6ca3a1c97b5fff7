export { ACCOUNT_FIELD_COUNT, assertAccountEquals, encodeAccount, type Account } from "./account";
export { ADDRESS_LENGTH, WORD_LENGTH } from "./fields";
export {
  HEADER_FIELD_INDEX,
  MAX_HEADER_FIELDS,
  MIN_HEADER_FIELDS,
  assertHeaderEquals,
  type BlockHeaderPartial,
} from "./header";
export { assertTransactionIndexEquals, encodeIndex } from "./index-key";
export {
  BYZANTIUM_BLOCK_NUMBER,
  LOGS_BLOOM_LENGTH,
  RECEIPT_FIELD_COUNT,
  assertReceiptCumulativeGasUsed,
  assertReceiptLogEquals,
  assertReceiptLogsBloom,
  assertReceiptRlpEquals,
  assertReceiptStateRoot,
  assertReceiptStatus,
  decodeReceipt,
  isPreByzantium,
  type DecodedReceipt,
  type ReceiptLog,
  type ReceiptPartial,
} from "./receipt";
export { assertStorageValueEquals, encodeStorageValue } from "./storage";
export {
  TRANSACTION_LAYOUTS,
  TRANSACTION_TYPES,
  assertTxRlpEquals,
  splitIntoTxTypeAndRlp,
  toTransactionEnvelope,
  transactionTypeFromByte,
  type TransactionEnvelopeParts,
  type TransactionLayout,
  type TransactionPartial,
  type TransactionType,
} from "./transaction";
