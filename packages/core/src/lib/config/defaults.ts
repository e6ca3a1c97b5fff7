import type { ProofBounds, TrieKind, VerifierConfig } from "./types";

/** Largest possible branch node: list header + 16 hashes + empty value slot. */
export const MAX_TRIE_NODE_LENGTH = 532;

export const DEFAULT_PROOF_BOUNDS: Readonly<Record<TrieKind, ProofBounds>> = {
  account: {
    maxDepth: 8,
    maxNodeLength: MAX_TRIE_NODE_LENGTH,
    maxLeafLength: 148,
    maxKeyLength: 32,
    maxValueLength: 110,
  },
  storage: {
    maxDepth: 6,
    maxNodeLength: MAX_TRIE_NODE_LENGTH,
    maxLeafLength: 69,
    maxKeyLength: 32,
    maxValueLength: 33,
  },
  transaction: {
    maxDepth: 4,
    maxNodeLength: MAX_TRIE_NODE_LENGTH,
    maxLeafLength: 564,
    maxKeyLength: 8,
    maxValueLength: 525,
  },
  receipt: {
    maxDepth: 4,
    maxNodeLength: MAX_TRIE_NODE_LENGTH,
    maxLeafLength: 1040,
    maxKeyLength: 8,
    maxValueLength: 1024,
  },
};

export const DEFAULT_VERIFIER_CONFIG: VerifierConfig = {
  version: "1.0",
  logLevel: "info",
  bounds: {
    account: { ...DEFAULT_PROOF_BOUNDS.account },
    storage: { ...DEFAULT_PROOF_BOUNDS.storage },
    transaction: { ...DEFAULT_PROOF_BOUNDS.transaction },
    receipt: { ...DEFAULT_PROOF_BOUNDS.receipt },
  },
};
