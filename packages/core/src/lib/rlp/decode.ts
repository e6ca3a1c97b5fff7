/**
 * Zero-copy RLP decoding.
 *
 * Decoders return offsets and lengths into the window they were given,
 * never copies of the bytes. Encoding of expected values is left to viem's
 * `toRlp`.
 *
 * References:
 *   - Ethereum Yellow Paper, Appendix B (Recursive Length Prefix)
 */

import { ByteWindow, toWindow, type ByteSource } from "../bytes/window";
import { VerificationError } from "../errors";

export type RlpKind = "string" | "list";

export interface RlpHeader {
  /** Header size: where the payload starts. */
  offset: number;
  /** Payload length. */
  length: number;
  kind: RlpKind;
}

/**
 * One decoded item of a list.
 *
 * For strings `offset` points at the payload and `length` is the payload
 * length. For nested lists `offset` points at the nested list's own header
 * and `length` covers header and payload, so the fragment can be decoded
 * again as a list.
 */
export interface RlpFragment {
  offset: number;
  length: number;
  kind: RlpKind;
}

export interface RlpList {
  header: RlpHeader;
  fields: readonly RlpFragment[];
  /** Maximum number of fields accepted for this decoding context. */
  capacity: number;
}

/** Long-form headers may use at most this many length bytes (payloads < 64 KiB). */
export const MAX_LENGTH_OF_LENGTH = 2;

/** Largest payload that still takes a single-byte header. */
export const MAX_SHORT_PAYLOAD = 55;

// ── Headers ───────────────────────────────────────────────────────

function readLongLength(window: ByteWindow, lengthOfLength: number): number {
  if (lengthOfLength > MAX_LENGTH_OF_LENGTH) {
    throw new VerificationError(
      "length-of-length-exceeded",
      `RLP length-of-length ${lengthOfLength} exceeds maximum ${MAX_LENGTH_OF_LENGTH}`
    );
  }
  if (1 + lengthOfLength > window.length) {
    throw new VerificationError(
      "truncated-input",
      `RLP header needs ${1 + lengthOfLength} bytes, input has ${window.length}`
    );
  }
  let length = 0;
  for (let i = 1; i <= lengthOfLength; i++) {
    length = length * 256 + window.at(i);
  }
  return length;
}

export function decodeHeader(source: ByteSource): RlpHeader {
  const window = toWindow(source);
  if (window.length === 0) {
    throw new VerificationError("truncated-input", "Cannot decode RLP header of empty input");
  }

  const prefix = window.at(0);
  let header: RlpHeader;

  if (prefix < 0x80) {
    header = { offset: 0, length: 1, kind: "string" };
  } else if (prefix < 0xb8) {
    header = { offset: 1, length: prefix - 0x80, kind: "string" };
  } else if (prefix < 0xc0) {
    const lengthOfLength = prefix - 0xb7;
    header = {
      offset: 1 + lengthOfLength,
      length: readLongLength(window, lengthOfLength),
      kind: "string",
    };
  } else if (prefix < 0xf8) {
    header = { offset: 1, length: prefix - 0xc0, kind: "list" };
  } else {
    const lengthOfLength = prefix - 0xf7;
    header = {
      offset: 1 + lengthOfLength,
      length: readLongLength(window, lengthOfLength),
      kind: "list",
    };
  }

  if (header.offset + header.length > window.length) {
    throw new VerificationError(
      "truncated-input",
      `RLP item declares ${header.offset + header.length} bytes, input has ${window.length}`
    );
  }
  return header;
}

/** Header plus payload length of the item at the start of `source`. */
export function encodedLength(source: ByteSource): number {
  const header = decodeHeader(source);
  return header.offset + header.length;
}

export function fragmentWindow(source: ByteSource, fragment: RlpFragment): ByteWindow {
  return toWindow(source).sub(fragment.offset, fragment.length);
}

// ── Strings ───────────────────────────────────────────────────────

export function decodeString(source: ByteSource): RlpFragment {
  const header = decodeHeader(source);
  if (header.kind !== "string") {
    throw new VerificationError("not-a-string", "Expected an RLP string, found a list");
  }
  return { offset: header.offset, length: header.length, kind: "string" };
}

// ── Lists ─────────────────────────────────────────────────────────

function decodeListHeader(window: ByteWindow): RlpHeader {
  const header = decodeHeader(window);
  if (header.kind !== "list") {
    throw new VerificationError("not-a-list", "Expected an RLP list, found a string");
  }
  return header;
}

function assertCapacity(count: number, capacity: number): void {
  if (count >= capacity) {
    throw new VerificationError(
      "field-count-exceeded",
      `RLP list has more than ${capacity} fields`
    );
  }
}

function assertExactEnd(cursor: number, end: number): void {
  if (cursor !== end) {
    throw new VerificationError(
      "length-mismatch",
      `RLP list fields end at ${cursor}, list declares end at ${end}`
    );
  }
}

export function decodeList(source: ByteSource, maxFields: number): RlpList {
  const window = toWindow(source);
  const header = decodeListHeader(window);
  const end = header.offset + header.length;
  const fields: RlpFragment[] = [];

  let cursor = header.offset;
  while (cursor < end) {
    assertCapacity(fields.length, maxFields);
    const field = decodeHeader(window.slice(cursor));
    if (field.kind === "string") {
      fields.push({ offset: cursor + field.offset, length: field.length, kind: "string" });
    } else {
      fields.push({ offset: cursor, length: field.offset + field.length, kind: "list" });
    }
    cursor += field.offset + field.length;
  }
  assertExactEnd(cursor, end);

  return { header, fields, capacity: maxFields };
}

/**
 * List decoding for trie nodes and accounts, where every field is a string
 * of at most 55 bytes and so carries a single-byte header.
 */
export function decodeListOfSmallStrings(source: ByteSource, maxFields: number): RlpList {
  const window = toWindow(source);
  const header = decodeListHeader(window);
  const end = header.offset + header.length;
  const fields: RlpFragment[] = [];

  let cursor = header.offset;
  while (cursor < end) {
    assertCapacity(fields.length, maxFields);
    const prefix = window.at(cursor);
    if (prefix < 0x80) {
      fields.push({ offset: cursor, length: 1, kind: "string" });
      cursor += 1;
    } else if (prefix < 0xb8) {
      const length = prefix - 0x80;
      fields.push({ offset: cursor + 1, length, kind: "string" });
      cursor += 1 + length;
    } else if (prefix < 0xc0) {
      throw new VerificationError(
        "header-too-long",
        `Field ${fields.length} has a multi-byte RLP header; expected at most ${MAX_SHORT_PAYLOAD} bytes`
      );
    } else {
      throw new VerificationError(
        "not-a-string",
        `Field ${fields.length} is a nested list; expected a string`
      );
    }
  }
  assertExactEnd(cursor, end);

  return { header, fields, capacity: maxFields };
}
