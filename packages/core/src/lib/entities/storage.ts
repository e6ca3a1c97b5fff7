import { bytesToHex, toRlp } from "viem";
import { assertUintWidth, uintToBytes } from "../bytes/pad";
import { toWindow, type ByteSource } from "../bytes/window";
import { VerificationError } from "../errors";
import { decodeString, fragmentWindow } from "../rlp/decode";
import { WORD_LENGTH, assertExactItem } from "./fields";

/** RLP of a storage word: the minimal big-endian value as a string. */
export function encodeStorageValue(value: bigint): Uint8Array {
  assertUintWidth(value, 256, "storage value");
  return toRlp(uintToBytes(value), "bytes");
}

/**
 * A storage leaf value is one RLP string of at most 32 bytes, so its
 * header is never longer than one byte.
 */
export function assertStorageValueEquals(rlp: ByteSource, value: bigint): void {
  assertUintWidth(value, 256, "storage value");
  const window = toWindow(rlp);
  const fragment = decodeString(window);
  if (fragment.offset > 1) {
    throw new VerificationError(
      "header-too-long",
      `Storage value uses a ${fragment.offset}-byte RLP header`
    );
  }
  if (fragment.length > WORD_LENGTH) {
    throw new VerificationError(
      "bound-exceeded",
      `Storage value is ${fragment.length} bytes; a word is ${WORD_LENGTH}`
    );
  }
  assertExactItem(window, "Storage value");

  const expected = uintToBytes(value);
  const actual = fragmentWindow(window, fragment);
  if (!actual.equals(expected)) {
    throw new VerificationError(
      "value-mismatch",
      `Storage value mismatch: expected ${bytesToHex(expected)}, got ${actual.toHex()}`
    );
  }
}
