/**
 * Hand-built trie nodes for proof tests. Every child reference is a hash,
 * so fixtures must keep each node at 32 encoded bytes or more.
 */

import { keccak256, toRlp } from "viem";
import { bytesToNibbles, compactEncode, type Nibbles } from "../nibbles";

export function leafNode(path: Nibbles, value: Uint8Array): Uint8Array {
  return toRlp([compactEncode(path, true), value], "bytes");
}

export function extensionNode(path: Nibbles, child: Uint8Array): Uint8Array {
  return toRlp([compactEncode(path, false), keccak256(child, "bytes")], "bytes");
}

/** Branch with hash references at the given slots and no value. */
export function branchNode(children: ReadonlyMap<number, Uint8Array>): Uint8Array {
  const slots: Uint8Array[] = [];
  for (let i = 0; i < 16; i++) {
    const child = children.get(i);
    slots.push(child ? keccak256(child, "bytes") : new Uint8Array(0));
  }
  slots.push(new Uint8Array(0));
  return toRlp(slots, "bytes");
}

export function hashOf(node: Uint8Array): Uint8Array {
  return keccak256(node, "bytes");
}

export interface SyntheticTrie {
  key: Uint8Array;
  value: Uint8Array;
  root: Uint8Array;
  /** Root to leaf: branch, extension, branch, leaf. */
  nodes: Uint8Array[];
}

/**
 * branch --key[0]--> extension(key[1..3]) --> branch --key[3]--> leaf(key[4..])
 *
 * Both branches carry a sibling leaf so they look like real trie nodes.
 */
export function buildSyntheticTrie(key: Uint8Array, value: Uint8Array): SyntheticTrie {
  const nibbles = bytesToNibbles(key);
  const leaf = leafNode(nibbles.slice(4), value);

  const sibling = leafNode(nibbles.slice(4).map((n) => (n + 1) % 16), value);
  const lower = branchNode(
    new Map([
      [nibbles[3], leaf],
      [(nibbles[3] + 1) % 16, sibling],
    ])
  );
  const extension = extensionNode(nibbles.slice(1, 3), lower);

  const farSibling = leafNode(nibbles.slice(1), value);
  const upper = branchNode(
    new Map([
      [nibbles[0], extension],
      [(nibbles[0] + 8) % 16, farSibling],
    ])
  );

  return { key, value, root: hashOf(upper), nodes: [upper, extension, lower, leaf] };
}
