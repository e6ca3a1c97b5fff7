import { hexToBytes, toRlp, type Hex } from "viem";
import { assertUintWidth, uintToBytes } from "../bytes/pad";
import { toWindow, type ByteSource } from "../bytes/window";
import { decodeListOfSmallStrings } from "../rlp/decode";
import {
  WORD_LENGTH,
  assertBytesField,
  assertExactItem,
  assertFieldCount,
  assertUintField,
  fixedBytes,
} from "./fields";

export const ACCOUNT_FIELD_COUNT = 4;

/** State trie leaf value: [nonce, balance, storageRoot, codeHash]. */
export interface Account {
  nonce: bigint;
  balance: bigint;
  storageHash: Hex;
  codeHash: Hex;
}

export function encodeAccount(account: Account): Uint8Array {
  assertUintWidth(account.nonce, 64, "nonce");
  assertUintWidth(account.balance, 128, "balance");
  return toRlp(
    [
      uintToBytes(account.nonce),
      uintToBytes(account.balance),
      hexToBytes(account.storageHash),
      hexToBytes(account.codeHash),
    ],
    "bytes"
  );
}

export function assertAccountEquals(rlp: ByteSource, account: Account): void {
  const window = toWindow(rlp);
  assertExactItem(window, "Account");
  const { fields } = decodeListOfSmallStrings(window, ACCOUNT_FIELD_COUNT);
  assertFieldCount(fields.length, ACCOUNT_FIELD_COUNT, "Account");

  assertUintField(window, fields[0], account.nonce, 64, "nonce");
  assertUintField(window, fields[1], account.balance, 128, "balance");
  assertBytesField(
    window,
    fields[2],
    fixedBytes(account.storageHash, WORD_LENGTH, "storageHash"),
    "storageHash"
  );
  assertBytesField(
    window,
    fields[3],
    fixedBytes(account.codeHash, WORD_LENGTH, "codeHash"),
    "codeHash"
  );
}
