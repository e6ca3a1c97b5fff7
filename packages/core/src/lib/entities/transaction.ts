/**
 * Transaction envelopes and per-type RLP field layouts.
 *
 * A transaction trie stores legacy transactions as a bare RLP list and typed
 * transactions (EIP-2718) as `type || rlp`. Envelopes handled here keep the
 * legacy form one byte longer: the RLP list followed by a zero pad byte,
 * which is what fixed-capacity proof inputs carry.
 */

import { concatBytes, hexToBigInt, hexToBytes, type Address, type Hex } from "viem";
import { toWindow, type ByteSource, type ByteWindow } from "../bytes/window";
import { VerificationError } from "../errors";
import { decodeList, type RlpFragment } from "../rlp/decode";
import {
  ADDRESS_LENGTH,
  assertBytesField,
  assertExactItem,
  assertFieldCount,
  assertUintField,
  fixedBytes,
  stringField,
} from "./fields";

// ── Types ──────────────────────────────────────────────────────────

export const TRANSACTION_TYPES = ["legacy", "eip2930", "eip1559", "eip4844", "eip7702"] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/** The fields every transaction kind shares, in caller-facing form. */
export interface TransactionPartial {
  nonce: bigint;
  gasLimit: bigint;
  /** `null` for contract creation. */
  to: Address | null;
  value: bigint;
  data: Hex;
  /** `v` for legacy transactions, `yParity` for typed ones. */
  v: bigint;
  r: Hex;
  s: Hex;
}

export interface TransactionLayout {
  typeByte: number;
  fieldCount: number;
  nonce: number;
  gasLimit: number;
  to: number;
  value: number;
  data: number;
  v: number;
  r: number;
  s: number;
}

// ── Layouts ────────────────────────────────────────────────────────

export const TRANSACTION_LAYOUTS: Readonly<Record<TransactionType, Readonly<TransactionLayout>>> =
  Object.freeze({
    legacy: Object.freeze({
      typeByte: 0x00, fieldCount: 9,
      nonce: 0, gasLimit: 2, to: 3, value: 4, data: 5, v: 6, r: 7, s: 8,
    }),
    eip2930: Object.freeze({
      typeByte: 0x01, fieldCount: 11,
      nonce: 1, gasLimit: 3, to: 4, value: 5, data: 6, v: 8, r: 9, s: 10,
    }),
    eip1559: Object.freeze({
      typeByte: 0x02, fieldCount: 12,
      nonce: 1, gasLimit: 4, to: 5, value: 6, data: 7, v: 9, r: 10, s: 11,
    }),
    eip4844: Object.freeze({
      typeByte: 0x03, fieldCount: 14,
      nonce: 1, gasLimit: 4, to: 5, value: 6, data: 7, v: 11, r: 12, s: 13,
    }),
    eip7702: Object.freeze({
      typeByte: 0x04, fieldCount: 13,
      nonce: 1, gasLimit: 4, to: 5, value: 6, data: 7, v: 10, r: 11, s: 12,
    }),
  });

export function transactionTypeFromByte(byte: number): TransactionType {
  const type = TRANSACTION_TYPES.find((t) => TRANSACTION_LAYOUTS[t].typeByte === byte);
  if (!type) {
    throw new VerificationError(
      "unknown-transaction-type",
      `Unknown transaction type byte 0x${byte.toString(16).padStart(2, "0")}`
    );
  }
  return type;
}

// ── Envelopes ──────────────────────────────────────────────────────

export interface TransactionEnvelopeParts {
  type: TransactionType;
  rlp: ByteWindow;
}

/**
 * Convert an encoded transaction as stored in the trie into an envelope:
 * legacy transactions (which start with a list header) get the zero pad
 * byte appended, typed transactions are returned as they are.
 */
export function toTransactionEnvelope(encoded: Uint8Array): Uint8Array {
  if (encoded.length === 0) {
    throw new VerificationError("truncated-input", "Encoded transaction is empty");
  }
  return encoded[0] >= 0xc0 ? concatBytes([encoded, new Uint8Array([0])]) : encoded.slice();
}

export function splitIntoTxTypeAndRlp(
  envelope: ByteSource,
  txType: TransactionType
): TransactionEnvelopeParts {
  const window = toWindow(envelope);
  if (window.length === 0) {
    throw new VerificationError("truncated-input", "Transaction envelope is empty");
  }

  if (txType === "legacy") {
    const pad = window.at(window.length - 1);
    if (pad !== 0) {
      throw new VerificationError(
        "invalid-legacy-padding",
        `Legacy envelope must end with a zero pad byte, found 0x${pad.toString(16)}`
      );
    }
    return { type: "legacy", rlp: window.sub(0, window.length - 1) };
  }

  const type = transactionTypeFromByte(window.at(0));
  if (type !== txType) {
    throw new VerificationError(
      "transaction-type-mismatch",
      `Envelope carries a ${type} transaction; expected ${txType}`
    );
  }
  return { type, rlp: window.slice(1) };
}

// ── Field comparison ───────────────────────────────────────────────

function assertToField(rlp: ByteWindow, fragment: RlpFragment, to: Address | null): void {
  if (to === null) {
    const actual = stringField(rlp, fragment, "to");
    if (actual.length !== 0) {
      throw new VerificationError(
        "field-mismatch",
        `to mismatch: expected contract creation, got ${actual.toHex()}`,
        "to"
      );
    }
    return;
  }
  assertBytesField(rlp, fragment, fixedBytes(to, ADDRESS_LENGTH, "to"), "to");
}

export function assertTxRlpEquals(
  envelope: ByteSource,
  txType: TransactionType,
  tx: TransactionPartial
): void {
  const { rlp } = splitIntoTxTypeAndRlp(envelope, txType);
  const layout = TRANSACTION_LAYOUTS[txType];
  assertExactItem(rlp, `${txType} transaction`);
  const { fields } = decodeList(rlp, layout.fieldCount);
  assertFieldCount(fields.length, layout.fieldCount, `${txType} transaction`);

  assertUintField(rlp, fields[layout.nonce], tx.nonce, 64, "nonce");
  assertUintField(rlp, fields[layout.gasLimit], tx.gasLimit, 64, "gasLimit");
  assertToField(rlp, fields[layout.to], tx.to);
  assertUintField(rlp, fields[layout.value], tx.value, 256, "value");
  assertBytesField(rlp, fields[layout.data], hexToBytes(tx.data), "data");
  assertUintField(rlp, fields[layout.v], tx.v, 256, "v");
  assertUintField(rlp, fields[layout.r], hexToBigInt(tx.r), 256, "r");
  assertUintField(rlp, fields[layout.s], hexToBigInt(tx.s), 256, "s");
}
