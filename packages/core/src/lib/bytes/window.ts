import { bytesToHex, type Hex } from "viem";
import { VerificationError } from "../errors";

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Non-owning, bounds-checked view of `length` bytes of `buffer` starting at
 * `offset`. Sub-windows share the same buffer; nothing is copied until
 * `toBytes` or `toFixedBytes` is called.
 */
export class ByteWindow {
  private constructor(
    readonly buffer: Uint8Array,
    readonly offset: number,
    readonly length: number
  ) {}

  static of(buffer: Uint8Array, offset = 0, length = buffer.length - offset): ByteWindow {
    if (!isIndex(offset) || !isIndex(length) || offset + length > buffer.length) {
      throw new VerificationError(
        "out-of-bounds",
        `Window [${offset}, +${length}) exceeds buffer capacity ${buffer.length}`
      );
    }
    return new ByteWindow(buffer, offset, length);
  }

  get capacity(): number {
    return this.buffer.length;
  }

  at(index: number): number {
    if (!isIndex(index) || index >= this.length) {
      throw new VerificationError(
        "out-of-bounds",
        `Index ${index} outside window of length ${this.length}`
      );
    }
    return this.buffer[this.offset + index];
  }

  sub(offset: number, length: number): ByteWindow {
    if (!isIndex(offset) || !isIndex(length) || offset + length > this.length) {
      throw new VerificationError(
        "out-of-bounds",
        `Sub-window [${offset}, +${length}) exceeds window of length ${this.length}`
      );
    }
    return new ByteWindow(this.buffer, this.offset + offset, length);
  }

  /** Everything from `offset` to the end of this window. */
  slice(offset: number): ByteWindow {
    return this.sub(offset, this.length - offset);
  }

  equals(other: ByteWindow | Uint8Array): boolean {
    const bytes = other instanceof ByteWindow ? other.view() : other;
    if (bytes.length !== this.length) return false;
    for (let i = 0; i < this.length; i++) {
      if (this.buffer[this.offset + i] !== bytes[i]) return false;
    }
    return true;
  }

  view(): Uint8Array {
    return this.buffer.subarray(this.offset, this.offset + this.length);
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(this.offset, this.offset + this.length);
  }

  /**
   * Owned copy of exactly `size` bytes, right-aligned (zero bytes in front),
   * so big-endian integers keep their value.
   */
  toFixedBytes(size: number): Uint8Array {
    if (this.length > size) {
      throw new VerificationError(
        "out-of-bounds",
        `Window of length ${this.length} does not fit in ${size} bytes`
      );
    }
    const out = new Uint8Array(size);
    out.set(this.view(), size - this.length);
    return out;
  }

  toHex(): Hex {
    return bytesToHex(this.view());
  }
}

export type ByteSource = ByteWindow | Uint8Array;

export function toWindow(source: ByteSource): ByteWindow {
  return source instanceof ByteWindow ? source : ByteWindow.of(source);
}
