/**
 * Nibble paths and hex-prefix (compact) encoding.
 *
 * References:
 *   - Ethereum Yellow Paper, Appendix C (Hex-Prefix Encoding)
 */

import { toWindow, type ByteSource } from "../bytes/window";
import { VerificationError } from "../errors";

export type Nibbles = readonly number[];

export type Parity = "even" | "odd";

export function bytesToNibbles(source: ByteSource): number[] {
  const bytes = toWindow(source).view();
  const nibbles: number[] = [];
  for (const byte of bytes) {
    nibbles.push((byte >> 4) & 0xf);
    nibbles.push(byte & 0xf);
  }
  return nibbles;
}

/**
 * Prefix nibbles: 0 extension/even, 1 extension/odd, 2 leaf/even, 3 leaf/odd.
 */
export function parity(prefix: number): Parity {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 3) {
    throw new VerificationError("invalid-prefix", `Invalid hex-prefix nibble ${prefix}`);
  }
  return prefix % 2 === 0 ? "even" : "odd";
}

export function isLeafPrefix(prefix: number): boolean {
  return prefix === 2 || prefix === 3;
}

/**
 * Remove the prefix nibble and, for even-length paths, the zero padding
 * nibble that follows it.
 */
export function stripPrefix(nibbles: Nibbles): number[] {
  if (nibbles.length === 0) {
    throw new VerificationError("invalid-prefix", "Cannot strip prefix of an empty path");
  }
  if (parity(nibbles[0]) === "odd") {
    return nibbles.slice(1);
  }
  if (nibbles.length < 2 || nibbles[1] !== 0) {
    throw new VerificationError(
      "invalid-padding",
      `Even-length path must pad with a zero nibble, found ${nibbles[1] ?? "nothing"}`
    );
  }
  return nibbles.slice(2);
}

/** HP(x, t): compact-encode a nibble path for a leaf (`t`) or extension. */
export function compactEncode(nibbles: Nibbles, isLeaf: boolean): Uint8Array {
  const flag = isLeaf ? 2 : 0;
  const odd = nibbles.length % 2 === 1;
  const padded = odd ? [flag + 1, ...nibbles] : [flag, 0, ...nibbles];

  const out = new Uint8Array(padded.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = padded[2 * i] * 16 + padded[2 * i + 1];
  }
  return out;
}

export function nibblesEqual(a: Nibbles, b: Nibbles): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
