import { concatBytes, hexToBigInt, hexToBytes, toRlp, type Hex } from "viem";
import { uintToBytes } from "../../bytes/pad";
import type { ReceiptLog } from "../receipt";
import {
  TRANSACTION_LAYOUTS,
  type TransactionPartial,
  type TransactionType,
} from "../transaction";

type RlpItem = Uint8Array | RlpItem[];

export const TO: Hex = "0x1111111111111111111111111111111111111111";
export const R: Hex = "0x7a2b3c4d5e6f708192a3b4c5d6e7f8091a2b3c4d5e6f708192a3b4c5d6e7f809";
export const S: Hex = "0x0000b2c3d4e5f60718293a4b5c6d7e8f90a1b2c3d4e5f60718293a4b5c6d7e8f";

export const sampleTx: TransactionPartial = {
  nonce: 7n,
  gasLimit: 21_000n,
  to: TO,
  value: 10n ** 18n,
  data: "0x1234",
  v: 1n,
  r: R,
  s: S,
};

// Positions of the access list, blob hashes and authorization list.
const LIST_FIELDS: Readonly<Record<TransactionType, readonly number[]>> = {
  legacy: [],
  eip2930: [7],
  eip1559: [8],
  eip4844: [8, 10],
  eip7702: [8, 9],
};

/** Encode a transaction as it is stored in the transaction trie. */
export function encodeTransaction(type: TransactionType, tx: TransactionPartial): Uint8Array {
  const layout = TRANSACTION_LAYOUTS[type];
  const fields: RlpItem[] = [];
  for (let i = 0; i < layout.fieldCount; i++) {
    fields.push(LIST_FIELDS[type].includes(i) ? [] : uintToBytes(BigInt(i + 100)));
  }
  fields[layout.nonce] = uintToBytes(tx.nonce);
  fields[layout.gasLimit] = uintToBytes(tx.gasLimit);
  fields[layout.to] = tx.to === null ? new Uint8Array(0) : hexToBytes(tx.to);
  fields[layout.value] = uintToBytes(tx.value);
  fields[layout.data] = hexToBytes(tx.data);
  fields[layout.v] = uintToBytes(tx.v);
  fields[layout.r] = uintToBytes(hexToBigInt(tx.r));
  fields[layout.s] = uintToBytes(hexToBigInt(tx.s));

  const rlp = toRlp(fields, "bytes");
  return type === "legacy" ? rlp : concatBytes([new Uint8Array([layout.typeByte]), rlp]);
}

export const BLOOM: Hex = `0x${"00".repeat(255)}01`;
export const STATE_ROOT: Hex = `0x${"ab".repeat(32)}`;

export const sampleLog: ReceiptLog = {
  address: TO,
  topics: [`0x${"01".repeat(32)}`, `0x${"02".repeat(32)}`],
  data: "0xdeadbeef",
};

export interface ReceiptFixture {
  /** 32-byte state root before Byzantium, status after. */
  first: { stateRoot: Hex } | { status: 0 | 1 };
  cumulativeGasUsed: bigint;
  logsBloom: Hex;
  logs: readonly ReceiptLog[];
}

/** Encode a receipt as it is stored in the receipt trie. */
export function encodeReceipt(type: TransactionType, receipt: ReceiptFixture): Uint8Array {
  const first =
    "stateRoot" in receipt.first
      ? hexToBytes(receipt.first.stateRoot)
      : uintToBytes(BigInt(receipt.first.status));
  const logs: RlpItem[] = receipt.logs.map((log) => [
    hexToBytes(log.address),
    log.topics.map((topic) => hexToBytes(topic)),
    hexToBytes(log.data),
  ]);
  const rlp = toRlp(
    [first, uintToBytes(receipt.cumulativeGasUsed), hexToBytes(receipt.logsBloom), logs],
    "bytes"
  );
  return type === "legacy"
    ? rlp
    : concatBytes([new Uint8Array([TRANSACTION_LAYOUTS[type].typeByte]), rlp]);
}
