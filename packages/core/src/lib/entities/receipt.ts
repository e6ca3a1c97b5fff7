/**
 * Receipt RLP checks.
 *
 * Receipts are `[postStateOrStatus, cumulativeGasUsed, logsBloom, logs]`.
 * Before Byzantium the first field is the 32-byte intermediate state root;
 * from Byzantium on it is the status (empty for failure, 0x01 for success).
 * Typed receipts share the type-byte envelope of their transaction.
 */

import { hexToBytes, type Address, type Hex } from "viem";
import type { ByteSource, ByteWindow } from "../bytes/window";
import { VerificationError } from "../errors";
import { decodeList, decodeListOfSmallStrings, type RlpFragment } from "../rlp/decode";
import {
  ADDRESS_LENGTH,
  WORD_LENGTH,
  assertBytesField,
  assertExactItem,
  assertFieldCount,
  assertUintField,
  fixedBytes,
  listField,
} from "./fields";
import { splitIntoTxTypeAndRlp, type TransactionType } from "./transaction";

/** Mainnet block that activated Byzantium (EIP-658 receipt status). */
export const BYZANTIUM_BLOCK_NUMBER = 4_370_000n;

export const RECEIPT_FIELD_COUNT = 4;
export const LOGS_BLOOM_LENGTH = 256;
export const LOG_FIELD_COUNT = 3;
export const MAX_LOG_TOPICS = 4;
export const MAX_RECEIPT_LOGS = 1024;

export function isPreByzantium(blockNumber: bigint): boolean {
  return blockNumber < BYZANTIUM_BLOCK_NUMBER;
}

// ── Types ──────────────────────────────────────────────────────────

export interface ReceiptPartial {
  /** Required before Byzantium, ignored after. */
  stateRoot: Hex | null;
  /** Required from Byzantium on, ignored before. */
  status: 0 | 1 | null;
  cumulativeGasUsed: bigint;
  logsBloom: Hex;
}

export interface ReceiptLog {
  address: Address;
  topics: readonly Hex[];
  data: Hex;
}

export interface DecodedReceipt {
  rlp: ByteWindow;
  fields: readonly RlpFragment[];
}

export function decodeReceipt(envelope: ByteSource, txType: TransactionType): DecodedReceipt {
  const { rlp } = splitIntoTxTypeAndRlp(envelope, txType);
  assertExactItem(rlp, "Receipt");
  const { fields } = decodeList(rlp, RECEIPT_FIELD_COUNT);
  assertFieldCount(fields.length, RECEIPT_FIELD_COUNT, "Receipt");
  return { rlp, fields };
}

// ── Field asserters ────────────────────────────────────────────────

export function assertReceiptStateRoot(receipt: DecodedReceipt, stateRoot: Hex): void {
  assertBytesField(
    receipt.rlp,
    receipt.fields[0],
    fixedBytes(stateRoot, WORD_LENGTH, "stateRoot"),
    "stateRoot"
  );
}

export function assertReceiptStatus(receipt: DecodedReceipt, status: 0 | 1): void {
  assertUintField(receipt.rlp, receipt.fields[0], BigInt(status), 8, "status");
}

export function assertReceiptCumulativeGasUsed(receipt: DecodedReceipt, gas: bigint): void {
  assertUintField(receipt.rlp, receipt.fields[1], gas, 64, "cumulativeGasUsed");
}

export function assertReceiptLogsBloom(receipt: DecodedReceipt, logsBloom: Hex): void {
  assertBytesField(
    receipt.rlp,
    receipt.fields[2],
    fixedBytes(logsBloom, LOGS_BLOOM_LENGTH, "logsBloom"),
    "logsBloom"
  );
}

export function assertReceiptRlpEquals(
  envelope: ByteSource,
  txType: TransactionType,
  blockNumber: bigint,
  receipt: ReceiptPartial
): void {
  const decoded = decodeReceipt(envelope, txType);

  if (isPreByzantium(blockNumber)) {
    if (receipt.stateRoot === null) {
      throw new VerificationError(
        "field-mismatch",
        `Block ${blockNumber} predates Byzantium; receipt needs a stateRoot`,
        "stateRoot"
      );
    }
    assertReceiptStateRoot(decoded, receipt.stateRoot);
  } else {
    if (receipt.status === null) {
      throw new VerificationError(
        "field-mismatch",
        `Block ${blockNumber} is post-Byzantium; receipt needs a status`,
        "status"
      );
    }
    assertReceiptStatus(decoded, receipt.status);
  }

  assertReceiptCumulativeGasUsed(decoded, receipt.cumulativeGasUsed);
  assertReceiptLogsBloom(decoded, receipt.logsBloom);
}

// ── Logs ───────────────────────────────────────────────────────────

export function assertReceiptLogEquals(
  envelope: ByteSource,
  txType: TransactionType,
  logIndex: number,
  log: ReceiptLog
): void {
  const { rlp, fields } = decodeReceipt(envelope, txType);
  const logsWindow = listField(rlp, fields[3], "logs");
  const logs = decodeList(logsWindow, MAX_RECEIPT_LOGS);

  if (!Number.isInteger(logIndex) || logIndex < 0 || logIndex >= logs.fields.length) {
    throw new VerificationError(
      "index-mismatch",
      `Log index ${logIndex} out of range; receipt has ${logs.fields.length} logs`
    );
  }

  const logWindow = listField(logsWindow, logs.fields[logIndex], `logs[${logIndex}]`);
  const entry = decodeList(logWindow, LOG_FIELD_COUNT);
  assertFieldCount(entry.fields.length, LOG_FIELD_COUNT, `logs[${logIndex}]`);
  const [addressField, topicsField, dataField] = entry.fields;

  assertBytesField(
    logWindow,
    addressField,
    fixedBytes(log.address, ADDRESS_LENGTH, "log.address"),
    "log.address"
  );

  const topicsWindow = listField(logWindow, topicsField, "log.topics");
  const topics = decodeListOfSmallStrings(topicsWindow, MAX_LOG_TOPICS);
  if (topics.fields.length !== log.topics.length) {
    throw new VerificationError(
      "field-mismatch",
      `log.topics has ${topics.fields.length} entries; expected ${log.topics.length}`,
      "log.topics"
    );
  }
  topics.fields.forEach((fragment, i) => {
    const field = `log.topics[${i}]`;
    assertBytesField(topicsWindow, fragment, fixedBytes(log.topics[i], WORD_LENGTH, field), field);
  });

  assertBytesField(logWindow, dataField, hexToBytes(log.data), "log.data");
}
