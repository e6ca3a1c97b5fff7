/**
 * Merkle Patricia Trie inclusion proof verification.
 *
 * Walks a bounded proof from the trie root to the leaf, re-deriving every
 * hash link with keccak256 and matching the key nibble by nibble. The
 * leaf's value must equal the expected value byte-for-byte.
 *
 * Only hash-referenced children are followed: inline (embedded) nodes
 * are rejected, as are exclusion proofs.
 *
 * References:
 *   - Ethereum Yellow Paper, Appendix D (Modified Merkle Patricia Trie)
 *   - EIP-1186 (eth_getProof)
 */

import { ByteWindow, toWindow, type ByteSource } from "../bytes/window";
import {
  VerificationError,
  toVerificationResult,
  type ProofVerificationResult,
} from "../errors";
import { getLogger } from "../logger";
import { decodeList, fragmentWindow } from "../rlp/decode";
import type { Proof, ProofInput } from "./input";
import { bytesToNibbles, isLeafPrefix, nibblesEqual, stripPrefix, type Nibbles } from "./nibbles";
import { LEAF_FIELD_COUNT, decodeNode, extractHash, verifyNodeHash } from "./node";

const log = getLogger("mpt");

export type WalkState = "at-root" | "walking" | "at-leaf" | "accepted" | "rejected";

function logTransition(state: WalkState, ...details: Record<string, unknown>[]): void {
  if (state === "rejected") {
    log.debug(state, ...details);
  } else {
    log.trace(state, ...details);
  }
}

// ── Proof shape ───────────────────────────────────────────────────

function assertProofShape(proof: Proof): void {
  if (!Number.isInteger(proof.depth) || proof.depth < 1) {
    throw new VerificationError("invalid-depth", `Proof depth ${proof.depth} must be at least 1`);
  }
  if (proof.depth - 1 > proof.nodes.length) {
    throw new VerificationError(
      "invalid-depth",
      `Proof depth ${proof.depth} exceeds node capacity ${proof.nodes.length} plus leaf`
    );
  }
}

// ── Leaf ──────────────────────────────────────────────────────────

function verifyLeaf(
  leaf: ByteWindow,
  expectedHash: ByteWindow,
  keyNibbles: Nibbles,
  keyPtr: number,
  value: ByteWindow
): void {
  verifyNodeHash(leaf, expectedHash);

  const list = decodeList(leaf, LEAF_FIELD_COUNT);
  if (list.fields.length !== LEAF_FIELD_COUNT) {
    throw new VerificationError(
      "invalid-node-shape",
      `Leaf node has ${list.fields.length} fields; expected ${LEAF_FIELD_COUNT}`
    );
  }
  const [pathField, valueField] = list.fields;
  if (pathField.kind !== "string" || valueField.kind !== "string") {
    throw new VerificationError("not-a-string", "Leaf path and value must be RLP strings");
  }

  const pathNibbles = bytesToNibbles(fragmentWindow(leaf, pathField));
  const prefix = pathNibbles[0];
  if (!isLeafPrefix(prefix)) {
    throw new VerificationError(
      "wrong-node-kind",
      `Terminal node has prefix ${prefix ?? "(empty path)"}; expected a leaf (2 or 3)`
    );
  }

  const remainder = stripPrefix(pathNibbles);
  const expected = keyNibbles.slice(keyPtr, keyPtr + remainder.length);
  if (!nibblesEqual(remainder, expected)) {
    throw new VerificationError(
      "path-mismatch",
      `Leaf path does not match key nibbles from position ${keyPtr}`
    );
  }
  if (keyPtr + remainder.length !== keyNibbles.length) {
    throw new VerificationError(
      "key-not-fully-consumed",
      `Leaf consumes ${keyPtr + remainder.length} of ${keyNibbles.length} key nibbles`
    );
  }

  const provenValue = fragmentWindow(leaf, valueField);
  if (!provenValue.equals(value)) {
    throw new VerificationError(
      "value-mismatch",
      `Value mismatch: proven ${provenValue.toHex()}, expected ${value.toHex()}`
    );
  }
}

// ── Walk ──────────────────────────────────────────────────────────

/**
 * Assert that `value` is stored at `key` under `root`. Throws a
 * `VerificationError` naming the first violated check.
 */
export function assertMerkleProof(
  key: ByteSource,
  value: ByteSource,
  root: ByteSource,
  proof: Proof
): void {
  assertProofShape(proof);

  const keyNibbles = bytesToNibbles(key);
  const innerCount = proof.depth - 1;
  let currentHash = toWindow(root);
  let keyPtr = 0;
  logTransition("at-root", { depth: proof.depth, keyNibbles: keyNibbles.length });

  for (let i = 0; i < proof.nodes.length; i++) {
    if (i >= innerCount) continue;

    const node = ByteWindow.of(proof.nodes[i]);
    verifyNodeHash(node, currentHash);
    const decoded = decodeNode(node);
    const step = extractHash(decoded, keyNibbles, keyPtr);
    currentHash = step.hash;
    keyPtr = step.keyPtr;
    logTransition("walking", { index: i, kind: decoded.kind, keyPtr });
  }

  logTransition("at-leaf", { keyPtr });
  verifyLeaf(ByteWindow.of(proof.leaf), currentHash, keyNibbles, keyPtr, toWindow(value));
  logTransition("accepted");
}

export function verifyMerkleProof(
  key: ByteSource,
  value: ByteSource,
  root: ByteSource,
  proof: Proof
): ProofVerificationResult {
  const result = toVerificationResult(() => assertMerkleProof(key, value, root, proof));
  if (!result.valid) {
    logTransition("rejected", { code: result.code, reason: result.errors[0] });
  }
  return result;
}

/** Verify several proofs against one root. One result per input, in order. */
export function verifyMerkleProofs(
  root: ByteSource,
  inputs: readonly ProofInput[]
): ProofVerificationResult[] {
  return inputs.map((input) => verifyMerkleProof(input.key, input.value, root, input.proof));
}
