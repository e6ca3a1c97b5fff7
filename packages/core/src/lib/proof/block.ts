/**
 * Transaction and receipt trie proofs. Both tries are keyed by the RLP of
 * the item's index in the block.
 */

import type { ByteSource } from "../bytes/window";
import { toVerificationResult, type ProofVerificationResult } from "../errors";
import { assertTransactionIndexEquals } from "../entities/index-key";
import { assertReceiptRlpEquals, type ReceiptPartial } from "../entities/receipt";
import {
  assertTxRlpEquals,
  toTransactionEnvelope,
  type TransactionPartial,
  type TransactionType,
} from "../entities/transaction";
import type { Proof } from "./input";
import { assertMerkleProof } from "./mpt";

interface IndexedProofInput {
  index: number | bigint;
  /** Trie key as supplied with the proof; must be the RLP of `index`. */
  key: Uint8Array;
  type: TransactionType;
  /** The trie value: bare RLP for legacy items, `type || rlp` otherwise. */
  encoded: Uint8Array;
  proof: Proof;
}

export interface TransactionProofInput extends IndexedProofInput {
  transaction: TransactionPartial;
}

export interface ReceiptProofInput extends IndexedProofInput {
  blockNumber: bigint;
  receipt: ReceiptPartial;
}

function assertIndexedInclusion(root: ByteSource, input: IndexedProofInput): void {
  assertTransactionIndexEquals(input.key, input.index);
  assertMerkleProof(input.key, input.encoded, root, input.proof);
}

export function assertTransactionProof(
  transactionsRoot: ByteSource,
  input: TransactionProofInput
): void {
  assertIndexedInclusion(transactionsRoot, input);
  assertTxRlpEquals(toTransactionEnvelope(input.encoded), input.type, input.transaction);
}

export function verifyTransactionProof(
  transactionsRoot: ByteSource,
  input: TransactionProofInput
): ProofVerificationResult {
  return toVerificationResult(() => assertTransactionProof(transactionsRoot, input));
}

export function assertReceiptProof(receiptsRoot: ByteSource, input: ReceiptProofInput): void {
  assertIndexedInclusion(receiptsRoot, input);
  assertReceiptRlpEquals(
    toTransactionEnvelope(input.encoded),
    input.type,
    input.blockNumber,
    input.receipt
  );
}

export function verifyReceiptProof(
  receiptsRoot: ByteSource,
  input: ReceiptProofInput
): ProofVerificationResult {
  return toVerificationResult(() => assertReceiptProof(receiptsRoot, input));
}
