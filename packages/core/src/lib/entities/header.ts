import { bytesToHex, keccak256, type Hex } from "viem";
import { toWindow, type ByteSource } from "../bytes/window";
import { VerificationError } from "../errors";
import { decodeList } from "../rlp/decode";
import { WORD_LENGTH, assertBytesField, assertExactItem, assertUintField, fixedBytes } from "./fields";

/** Field positions in an RLP block header. */
export const HEADER_FIELD_INDEX = {
  stateRoot: 3,
  transactionsRoot: 4,
  receiptsRoot: 5,
  number: 8,
  withdrawalsRoot: 16,
} as const;

/** Frontier headers have 15 fields; later forks append to the end. */
export const MIN_HEADER_FIELDS = 15;
export const MAX_HEADER_FIELDS = 21;

export interface BlockHeaderPartial {
  number: bigint;
  hash: Hex;
  stateRoot: Hex;
  transactionsRoot: Hex;
  receiptsRoot: Hex;
  /** `null` for blocks before Shanghai. */
  withdrawalsRoot: Hex | null;
}

/**
 * Check an RLP block header against its hash and the roots that anchor
 * state, transaction and receipt proofs.
 */
export function assertHeaderEquals(headerRlp: ByteSource, header: BlockHeaderPartial): void {
  const window = toWindow(headerRlp);
  assertExactItem(window, "Block header");

  const expectedHash = fixedBytes(header.hash, WORD_LENGTH, "hash");
  const actualHash = keccak256(window.view(), "bytes");
  if (!toWindow(actualHash).equals(expectedHash)) {
    throw new VerificationError(
      "hash-mismatch",
      `Header hash mismatch: expected ${header.hash}, got ${bytesToHex(actualHash)}`
    );
  }

  const { fields } = decodeList(window, MAX_HEADER_FIELDS);
  if (fields.length < MIN_HEADER_FIELDS) {
    throw new VerificationError(
      "invalid-field-count",
      `Block header has ${fields.length} fields; expected at least ${MIN_HEADER_FIELDS}`
    );
  }

  const roots = ["stateRoot", "transactionsRoot", "receiptsRoot"] as const;
  for (const root of roots) {
    assertBytesField(
      window,
      fields[HEADER_FIELD_INDEX[root]],
      fixedBytes(header[root], WORD_LENGTH, root),
      root
    );
  }
  assertUintField(window, fields[HEADER_FIELD_INDEX.number], header.number, 64, "number");

  const hasWithdrawals = fields.length > HEADER_FIELD_INDEX.withdrawalsRoot;
  if (header.withdrawalsRoot === null) {
    if (hasWithdrawals) {
      throw new VerificationError(
        "field-mismatch",
        "withdrawalsRoot mismatch: header carries one, none expected",
        "withdrawalsRoot"
      );
    }
    return;
  }
  if (!hasWithdrawals) {
    throw new VerificationError(
      "field-mismatch",
      `withdrawalsRoot mismatch: header has only ${fields.length} fields`,
      "withdrawalsRoot"
    );
  }
  assertBytesField(
    window,
    fields[HEADER_FIELD_INDEX.withdrawalsRoot],
    fixedBytes(header.withdrawalsRoot, WORD_LENGTH, "withdrawalsRoot"),
    "withdrawalsRoot"
  );
}
