import { hexToBigInt, hexToBytes, type Hex } from "viem";
import type { ByteSource } from "../bytes/window";
import { DEFAULT_VERIFIER_CONFIG } from "../config/defaults";
import type { VerifierConfig } from "../config/types";
import { encodeAccount, type Account } from "../entities/account";
import { encodeStorageValue } from "../entities/storage";
import {
  VerificationError,
  toVerificationResult,
  type ProofVerificationResult,
} from "../errors";
import { getLogger } from "../logger";
import { accountProofSchema, type AccountProof, type StorageProofEntry } from "../types";
import { buildProof } from "./input";
import { assertAccountProof, assertStorageProof } from "./state";

const log = getLogger("mpt");

export interface StorageSlotResult {
  key: Hex;
  result: ProofVerificationResult;
}

export interface EthGetProofVerificationResult {
  valid: boolean;
  errors: string[];
  account: ProofVerificationResult;
  storage: StorageSlotResult[];
}

function storageValue(raw: Hex): bigint {
  return raw === "0x" ? 0n : hexToBigInt(raw);
}

export function accountFromProof(response: AccountProof): Account {
  return {
    nonce: BigInt(response.nonce),
    balance: BigInt(response.balance),
    storageHash: response.storageHash,
    codeHash: response.codeHash,
  };
}

function verifyStorageEntry(
  storageRoot: ByteSource,
  entry: StorageProofEntry,
  config: VerifierConfig
): ProofVerificationResult {
  return toVerificationResult(() => {
    const value = storageValue(entry.value);
    // Zero slots are deleted from the trie, so proving them needs an
    // exclusion proof.
    if (value === 0n) {
      throw new VerificationError(
        "value-mismatch",
        `Storage slot ${entry.key} is zero; exclusion proofs are not supported`
      );
    }
    const proof = buildProof(entry.proof.map((node) => hexToBytes(node)), config.bounds.storage);
    assertStorageProof(storageRoot, {
      slot: entry.key,
      value,
      encoded: encodeStorageValue(value),
      proof,
    });
  });
}

/**
 * Verify an `eth_getProof` response against a state root: the account
 * proof, then every storage proof against the proven `storageHash`.
 *
 * The response is validated with zod first; a malformed response throws a
 * `ZodError` rather than producing a result.
 */
export function verifyEthGetProof(
  stateRoot: Hex,
  response: unknown,
  config: VerifierConfig = DEFAULT_VERIFIER_CONFIG
): EthGetProofVerificationResult {
  const parsed = accountProofSchema.parse(response);
  const account = accountFromProof(parsed);

  const accountResult = toVerificationResult(() => {
    const proof = buildProof(
      parsed.accountProof.map((node) => hexToBytes(node)),
      config.bounds.account
    );
    assertAccountProof(hexToBytes(stateRoot), {
      address: parsed.address,
      account,
      value: encodeAccount(account),
      proof,
    });
  });

  const storageRoot = hexToBytes(parsed.storageHash);
  const storage = parsed.storageProof.map((entry) => ({
    key: entry.key,
    result: verifyStorageEntry(storageRoot, entry, config),
  }));

  const errors = [
    ...accountResult.errors.map((e) => `Account proof: ${e}`),
    ...storage.flatMap(({ key, result }) =>
      result.errors.map((e) => `Storage proof for slot ${key}: ${e}`)
    ),
  ];
  if (errors.length > 0) {
    log.debug("eth_getProof rejected", { address: parsed.address, errors: errors.length });
  }

  return { valid: errors.length === 0, errors, account: accountResult, storage };
}
