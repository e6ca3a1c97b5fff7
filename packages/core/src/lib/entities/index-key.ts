import { bytesToHex, toRlp } from "viem";
import { uintToBytes } from "../bytes/pad";
import { toWindow, type ByteSource } from "../bytes/window";
import { VerificationError } from "../errors";
import { decodeString, fragmentWindow } from "../rlp/decode";
import { assertExactItem } from "./fields";

function toIndex(index: number | bigint): bigint {
  if (typeof index === "number" && !Number.isSafeInteger(index)) {
    throw new VerificationError("bound-exceeded", `Index ${index} is not a safe integer`);
  }
  return BigInt(index);
}

/** Transaction and receipt trie key: RLP of the list index (0 → 0x80). */
export function encodeIndex(index: number | bigint): Uint8Array {
  return toRlp(uintToBytes(toIndex(index)), "bytes");
}

export function assertTransactionIndexEquals(keyRlp: ByteSource, index: number | bigint): void {
  const expected = toIndex(index);
  const window = toWindow(keyRlp);
  const fragment = decodeString(window);
  assertExactItem(window, "Index key");
  const payload = fragmentWindow(window, fragment);

  // Zero-length payload is index 0.
  if (payload.length === 0) {
    if (expected !== 0n) {
      throw new VerificationError("index-mismatch", `Key encodes index 0; expected ${expected}`);
    }
    return;
  }

  const encoded = uintToBytes(expected);
  if (!payload.equals(encoded)) {
    throw new VerificationError(
      "index-mismatch",
      `Key payload ${payload.toHex()} does not encode index ${expected} (${bytesToHex(encoded)})`
    );
  }
}
