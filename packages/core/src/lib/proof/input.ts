import { rightPad } from "../bytes/pad";
import { VerificationError } from "../errors";
import type { ProofBounds } from "../config/types";

/**
 * A fixed-capacity proof. `nodes` always holds `maxDepth` buffers of
 * `maxNodeLength` bytes; only the first `depth - 1` are real, the rest are
 * zero-filled padding that the verifier never reads.
 */
export interface Proof {
  nodes: readonly Uint8Array[];
  leaf: Uint8Array;
  /** Number of real nodes including the leaf. */
  depth: number;
}

export interface ProofInput {
  key: Uint8Array;
  value: Uint8Array;
  proof: Proof;
}

function assertWithin(length: number, max: number, what: string): void {
  if (length > max) {
    throw new VerificationError("bound-exceeded", `${what} length ${length} exceeds maximum ${max}`);
  }
}

/**
 * Split raw root-to-leaf nodes (as returned by eth_getProof or a trie
 * library) into padded inner nodes and the leaf.
 */
export function buildProof(rawNodes: readonly Uint8Array[], bounds: ProofBounds): Proof {
  const leaf = rawNodes.at(-1);
  if (!leaf) {
    throw new VerificationError("invalid-depth", "Proof must contain at least the leaf node");
  }

  const inner = rawNodes.slice(0, -1);
  if (inner.length > bounds.maxDepth) {
    throw new VerificationError(
      "bound-exceeded",
      `Proof has ${inner.length} nodes excluding the leaf; maximum is ${bounds.maxDepth}`
    );
  }
  inner.forEach((node, i) => assertWithin(node.length, bounds.maxNodeLength, `Node ${i}`));
  assertWithin(leaf.length, bounds.maxLeafLength, "Leaf node");

  const nodes = inner.map((node) => rightPad(node, bounds.maxNodeLength));
  while (nodes.length < bounds.maxDepth) {
    nodes.push(new Uint8Array(bounds.maxNodeLength));
  }

  return {
    nodes,
    leaf: rightPad(leaf, bounds.maxLeafLength),
    depth: rawNodes.length,
  };
}

export function buildProofInput(
  key: Uint8Array,
  value: Uint8Array,
  rawNodes: readonly Uint8Array[],
  bounds: ProofBounds
): ProofInput {
  assertWithin(key.length, bounds.maxKeyLength, "Key");
  assertWithin(value.length, bounds.maxValueLength, "Value");
  return { key, value, proof: buildProof(rawNodes, bounds) };
}

