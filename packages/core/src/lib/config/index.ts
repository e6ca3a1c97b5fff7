export type { ProofBounds, TrieKind, VerifierConfig } from "./types";
export { proofBoundsSchema, trieKindSchema, verifierConfigSchema, TRIE_KINDS } from "./types";
export { DEFAULT_PROOF_BOUNDS, DEFAULT_VERIFIER_CONFIG, MAX_TRIE_NODE_LENGTH } from "./defaults";
export {
  loadVerifierConfig,
  saveVerifierConfig,
  resetVerifierConfig,
  getProofBounds,
  applyVerifierConfig,
  type ConfigStore,
  type ConfigLoadResult,
  type ConfigLoadWarning,
  type ConfigLoadWarningKind,
} from "./store";
