import { bytesToHex, hexToBytes, type Hex } from "viem";
import { assertUintWidth, uintToBytes } from "../bytes/pad";
import type { ByteWindow } from "../bytes/window";
import { VerificationError } from "../errors";
import { encodedLength, fragmentWindow, type RlpFragment } from "../rlp/decode";

export const WORD_LENGTH = 32;
export const ADDRESS_LENGTH = 20;

// ── Caller-side byte fields ────────────────────────────────────────

/** Decode a caller-supplied hex field of an exact byte length. */
export function fixedBytes(value: Hex, length: number, field: string): Uint8Array {
  const bytes = hexToBytes(value);
  if (bytes.length !== length) {
    throw new VerificationError(
      "bound-exceeded",
      `${field} must be ${length} bytes, got ${bytes.length}`,
      field
    );
  }
  return bytes;
}

// ── Decoded field comparisons ──────────────────────────────────────

export function stringField(window: ByteWindow, fragment: RlpFragment, field: string): ByteWindow {
  if (fragment.kind !== "string") {
    throw new VerificationError("field-mismatch", `${field} is a list; expected a string`, field);
  }
  return fragmentWindow(window, fragment);
}

export function listField(window: ByteWindow, fragment: RlpFragment, field: string): ByteWindow {
  if (fragment.kind !== "list") {
    throw new VerificationError("field-mismatch", `${field} is a string; expected a list`, field);
  }
  return fragmentWindow(window, fragment);
}

export function assertBytesField(
  window: ByteWindow,
  fragment: RlpFragment,
  expected: Uint8Array,
  field: string
): void {
  const actual = stringField(window, fragment, field);
  if (!actual.equals(expected)) {
    throw new VerificationError(
      "field-mismatch",
      `${field} mismatch: expected ${bytesToHex(expected)}, got ${actual.toHex()}`,
      field
    );
  }
}

/** Integers are stored minimal big-endian, so comparing bytes compares values. */
export function assertUintField(
  window: ByteWindow,
  fragment: RlpFragment,
  expected: bigint,
  bits: number,
  field: string
): void {
  assertUintWidth(expected, bits, field);
  assertBytesField(window, fragment, uintToBytes(expected), field);
}

/** The window must hold exactly one RLP item and nothing after it. */
export function assertExactItem(window: ByteWindow, what: string): void {
  const length = encodedLength(window);
  if (length !== window.length) {
    throw new VerificationError(
      "length-mismatch",
      `${what} declares ${length} bytes but ${window.length} were given`
    );
  }
}

export function assertFieldCount(actual: number, expected: number, what: string): void {
  if (actual !== expected) {
    throw new VerificationError(
      "invalid-field-count",
      `${what} has ${actual} fields; expected ${expected}`
    );
  }
}
