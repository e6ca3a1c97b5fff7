export {
  assertMerkleProof,
  verifyMerkleProof,
  verifyMerkleProofs,
  type WalkState,
} from "./mpt";
export {
  accountTrieKey,
  assertAccountProof,
  assertStorageProof,
  normalizeStorageSlotKey,
  storageTrieKey,
  verifyAccountProof,
  verifyStorageProof,
  verifyStorageProofs,
  type AccountProofInput,
  type StorageProofInput,
} from "./state";
export {
  assertReceiptProof,
  assertTransactionProof,
  verifyReceiptProof,
  verifyTransactionProof,
  type ReceiptProofInput,
  type TransactionProofInput,
} from "./block";
export {
  accountFromProof,
  verifyEthGetProof,
  type EthGetProofVerificationResult,
  type StorageSlotResult,
} from "./eth-get-proof";
export { buildProof, buildProofInput, type Proof, type ProofInput } from "./input";
export {
  bytesToNibbles,
  compactEncode,
  isLeafPrefix,
  nibblesEqual,
  parity,
  stripPrefix,
  type Nibbles,
  type Parity,
} from "./nibbles";
export {
  BRANCH_FIELD_COUNT,
  EXTENSION_FIELD_COUNT,
  HASH_LENGTH,
  LEAF_FIELD_COUNT,
  classifyNode,
  decodeNode,
  extractHash,
  extractHashFromBranch,
  extractHashFromExtension,
  nodeHash,
  verifyNodeHash,
  type DecodedNode,
  type HashStep,
  type NodeKind,
} from "./node";
