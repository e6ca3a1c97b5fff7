import { keccak256 } from "viem";
import { toWindow, type ByteSource, type ByteWindow } from "../bytes/window";
import { VerificationError } from "../errors";
import {
  decodeListOfSmallStrings,
  encodedLength,
  fragmentWindow,
  type RlpFragment,
  type RlpList,
} from "../rlp/decode";
import { bytesToNibbles, nibblesEqual, stripPrefix, type Nibbles } from "./nibbles";

export const BRANCH_FIELD_COUNT = 17;
export const EXTENSION_FIELD_COUNT = 2;
export const LEAF_FIELD_COUNT = 2;
export const HASH_LENGTH = 32;

export type NodeKind = "branch" | "extension";

export interface DecodedNode {
  kind: NodeKind;
  node: ByteWindow;
  fields: readonly RlpFragment[];
}

export interface HashStep {
  hash: ByteWindow;
  /** Key nibbles consumed after this node. */
  keyPtr: number;
}

export function classifyNode(list: RlpList): NodeKind {
  if (list.fields.length === BRANCH_FIELD_COUNT) return "branch";
  if (list.fields.length === EXTENSION_FIELD_COUNT) return "extension";
  throw new VerificationError(
    "invalid-node-shape",
    `Trie node has ${list.fields.length} fields; expected ${BRANCH_FIELD_COUNT} or ${EXTENSION_FIELD_COUNT}`
  );
}

export function decodeNode(source: ByteSource): DecodedNode {
  const node = toWindow(source);
  const list = decodeListOfSmallStrings(node, BRANCH_FIELD_COUNT);
  return { kind: classifyNode(list), node, fields: list.fields };
}

function childHash(node: ByteWindow, field: RlpFragment, where: string): ByteWindow {
  if (field.length !== HASH_LENGTH) {
    throw new VerificationError(
      "expected-hash-got-value",
      `Expected ${HASH_LENGTH}-byte hash at ${where}, got ${field.length} bytes`
    );
  }
  return fragmentWindow(node, field);
}

export function extractHashFromBranch(
  node: ByteWindow,
  fields: readonly RlpFragment[],
  keyNibbles: Nibbles,
  keyPtr: number
): HashStep {
  if (keyPtr >= keyNibbles.length) {
    throw new VerificationError(
      "path-mismatch",
      `Key exhausted at branch node after ${keyPtr} nibbles`
    );
  }
  const nibble = keyNibbles[keyPtr];
  const hash = childHash(node, fields[nibble], `branch slot ${nibble.toString(16)}`);
  return { hash, keyPtr: keyPtr + 1 };
}

export function extractHashFromExtension(
  node: ByteWindow,
  fields: readonly RlpFragment[],
  keyNibbles: Nibbles,
  keyPtr: number
): HashStep {
  const pathNibbles = bytesToNibbles(fragmentWindow(node, fields[0]));
  const prefix = pathNibbles[0];
  if (prefix !== 0 && prefix !== 1) {
    throw new VerificationError(
      "wrong-node-kind",
      `Expected extension prefix 0 or 1, found ${prefix ?? "empty path"}`
    );
  }

  const partialKey = stripPrefix(pathNibbles);
  const expected = keyNibbles.slice(keyPtr, keyPtr + partialKey.length);
  if (!nibblesEqual(partialKey, expected)) {
    throw new VerificationError(
      "path-mismatch",
      `Extension path does not match key nibbles ${keyPtr}..${keyPtr + partialKey.length}`
    );
  }

  const hash = childHash(node, fields[1], "extension child");
  return { hash, keyPtr: keyPtr + partialKey.length };
}

export function extractHash(decoded: DecodedNode, keyNibbles: Nibbles, keyPtr: number): HashStep {
  return decoded.kind === "branch"
    ? extractHashFromBranch(decoded.node, decoded.fields, keyNibbles, keyPtr)
    : extractHashFromExtension(decoded.node, decoded.fields, keyNibbles, keyPtr);
}

// ── Hashing ───────────────────────────────────────────────────────

/** Keccak-256 over the node's RLP-declared bytes, ignoring buffer padding. */
export function nodeHash(source: ByteSource): Uint8Array {
  const node = toWindow(source);
  return keccak256(node.sub(0, encodedLength(node)).view(), "bytes");
}

export function verifyNodeHash(source: ByteSource, expected: ByteSource): void {
  const actual = nodeHash(source);
  const wanted = toWindow(expected);
  if (!wanted.equals(actual)) {
    throw new VerificationError(
      "hash-mismatch",
      `Node hash mismatch: expected ${wanted.toHex()}, got ${toWindow(actual).toHex()}`
    );
  }
}
