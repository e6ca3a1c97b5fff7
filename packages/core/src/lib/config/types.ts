import { z } from "zod";
import { LOG_LEVEL_NAMES } from "../logger";

const positiveInt = z.number().int().positive();

export const proofBoundsSchema = z.object({
  /** Inner nodes, excluding the leaf. */
  maxDepth: positiveInt,
  maxNodeLength: positiveInt,
  maxLeafLength: positiveInt,
  maxKeyLength: positiveInt,
  maxValueLength: positiveInt,
});

export const TRIE_KINDS = ["account", "storage", "transaction", "receipt"] as const;
export const trieKindSchema = z.enum(TRIE_KINDS);

export const verifierConfigSchema = z.object({
  version: z.literal("1.0"),
  logLevel: z.enum(LOG_LEVEL_NAMES).default("info"),
  bounds: z.object({
    account: proofBoundsSchema,
    storage: proofBoundsSchema,
    transaction: proofBoundsSchema,
    receipt: proofBoundsSchema,
  }),
});

export type ProofBounds = z.infer<typeof proofBoundsSchema>;
export type TrieKind = z.infer<typeof trieKindSchema>;
export type VerifierConfig = z.infer<typeof verifierConfigSchema>;
