import { numberToBytes } from "viem";
import { VerificationError } from "../errors";

// ── Fixed-capacity padding ─────────────────────────────────────────

/** Zero-pad in front up to `length`. Never truncates. */
export function leftPad(bytes: Uint8Array, length: number): Uint8Array {
  if (bytes.length > length) {
    throw new VerificationError(
      "bound-exceeded",
      `Cannot left-pad ${bytes.length} bytes into ${length}`
    );
  }
  const out = new Uint8Array(length);
  out.set(bytes, length - bytes.length);
  return out;
}

/** Zero-pad at the end up to `length`. Never truncates. */
export function rightPad(bytes: Uint8Array, length: number): Uint8Array {
  if (bytes.length > length) {
    throw new VerificationError(
      "bound-exceeded",
      `Cannot right-pad ${bytes.length} bytes into ${length}`
    );
  }
  const out = new Uint8Array(length);
  out.set(bytes, 0);
  return out;
}

// ── Unsigned integers ──────────────────────────────────────────────

/**
 * Minimal big-endian encoding used by RLP for scalars: no leading zero
 * bytes, and zero is the empty byte string.
 */
export function uintToBytes(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new VerificationError("bound-exceeded", `Negative integer ${value}`);
  }
  if (value === 0n) return new Uint8Array(0);
  return numberToBytes(value);
}

export function assertUintWidth(value: bigint, bits: number, field: string): void {
  if (value < 0n || value >= 1n << BigInt(bits)) {
    throw new VerificationError(
      "bound-exceeded",
      `${field} ${value} does not fit in u${bits}`,
      field
    );
  }
}
