/**
 * State and storage trie proofs.
 *
 * Both tries are "secure": the trie key is keccak256 of the account address
 * or of the 32-byte storage slot, never the raw value.
 */

import { hexToBytes, keccak256, type Address, type Hex } from "viem";
import { toWindow, type ByteSource } from "../bytes/window";
import { VerificationError, toVerificationResult, type ProofVerificationResult } from "../errors";
import { assertAccountEquals, type Account } from "../entities/account";
import { ADDRESS_LENGTH, fixedBytes } from "../entities/fields";
import { assertStorageValueEquals } from "../entities/storage";
import type { Proof } from "./input";
import { assertMerkleProof } from "./mpt";

// ── Keys ───────────────────────────────────────────────────────────

/**
 * Normalize a storage slot to its canonical 32-byte word.
 *
 * RPC providers may return compact quantity keys (e.g. `0x0`) for simple
 * storage slots, but trie paths are computed from the padded value.
 */
export function normalizeStorageSlotKey(rawKey: Hex): Hex {
  const digits = rawKey.toLowerCase().slice(2);
  if (!rawKey.startsWith("0x") || !/^[0-9a-f]+$/.test(digits) || digits.length > 64) {
    throw new VerificationError("bound-exceeded", `Invalid storage slot key ${rawKey}`);
  }
  return `0x${digits.padStart(64, "0")}`;
}

export function storageTrieKey(slot: Hex): Uint8Array {
  return keccak256(hexToBytes(normalizeStorageSlotKey(slot)), "bytes");
}

export function accountTrieKey(address: Address): Uint8Array {
  return keccak256(fixedBytes(address, ADDRESS_LENGTH, "address"), "bytes");
}

// ── Storage ────────────────────────────────────────────────────────

export interface StorageProofInput {
  slot: Hex;
  value: bigint;
  /** RLP of the value exactly as stored at the leaf. */
  encoded: Uint8Array;
  proof: Proof;
}

export function assertStorageProof(storageRoot: ByteSource, input: StorageProofInput): void {
  assertMerkleProof(storageTrieKey(input.slot), input.encoded, storageRoot, input.proof);
  assertStorageValueEquals(input.encoded, input.value);
}

export function verifyStorageProof(
  storageRoot: ByteSource,
  input: StorageProofInput
): ProofVerificationResult {
  return toVerificationResult(() => assertStorageProof(storageRoot, input));
}

export function verifyStorageProofs(
  storageRoot: ByteSource,
  inputs: readonly StorageProofInput[]
): ProofVerificationResult[] {
  const root = toWindow(storageRoot);
  return inputs.map((input) => verifyStorageProof(root, input));
}

// ── Accounts ───────────────────────────────────────────────────────

export interface AccountProofInput {
  address: Address;
  account: Account;
  /** RLP of the account exactly as stored at the leaf. */
  value: Uint8Array;
  proof: Proof;
}

export function assertAccountProof(stateRoot: ByteSource, input: AccountProofInput): void {
  assertMerkleProof(accountTrieKey(input.address), input.value, stateRoot, input.proof);
  assertAccountEquals(input.value, input.account);
}

export function verifyAccountProof(
  stateRoot: ByteSource,
  input: AccountProofInput
): ProofVerificationResult {
  return toVerificationResult(() => assertAccountProof(stateRoot, input));
}
