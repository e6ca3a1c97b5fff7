import { isHex, type Hex } from "viem";
import { z } from "zod";

// Lets schemas output viem's `Hex` instead of a plain string.
function isHexString(value: string): value is Hex {
  return isHex(value, { strict: true });
}

// Ethereum address schema
export const addressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, "Invalid Ethereum address")
  .refine(isHexString, "Invalid Ethereum address");

// Ethereum hash schema
export const hashSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{64}$/, "Invalid hash")
  .refine(isHexString, "Invalid hash");

// Trie nodes are non-empty, whole-byte hex strings.
export const trieNodeSchema = z
  .string()
  .regex(/^0x(?:[a-fA-F0-9]{2})+$/, "Invalid trie node")
  .refine(isHexString, "Invalid trie node");

// EVM quantity-like numeric string accepted across package boundaries.
// Supports decimal ("21000") and lowercase-prefixed hex ("0x5208").
export const evmQuantitySchema = z
  .string()
  .regex(/^(?:0x[a-fA-F0-9]+|[0-9]+)$/, "Invalid numeric quantity");

// Storage slot keys from eth_getProof may be compact quantities (e.g. 0x0)
// or fully padded 32-byte words.
export const storageSlotKeySchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]+$/, "Invalid storage slot key")
  .refine(isHexString, "Invalid storage slot key")
  .refine((value) => value.length <= 66, "Invalid storage slot key");

// Storage values in eth_getProof are quantities and may be compact.
export const storageValueSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]*$/, "Invalid storage value")
  .refine(isHexString, "Invalid storage value")
  .refine((value) => value.length <= 66, "Invalid storage value");

// Storage proof for a single slot
export const storageProofEntrySchema = z.object({
  key: storageSlotKeySchema,
  value: storageValueSchema,
  proof: z.array(trieNodeSchema),
});

export type StorageProofEntry = z.infer<typeof storageProofEntrySchema>;

// Account proof from eth_getProof. Raw RPC responses carry the nonce as a
// hex quantity; clients that normalize responses pass a number.
export const accountProofSchema = z.object({
  address: addressSchema,
  balance: evmQuantitySchema,
  codeHash: hashSchema,
  nonce: z.union([z.number().int().nonnegative(), evmQuantitySchema]),
  storageHash: hashSchema,
  accountProof: z.array(trieNodeSchema),
  storageProof: z.array(storageProofEntrySchema),
});

export type AccountProof = z.infer<typeof accountProofSchema>;
