/**
 * Machine-readable failure codes for proof verification and entity checks.
 *
 * Codes are part of the public contract: callers branch on them to tell
 * malformed input apart from a cryptographic rejection. Keep them stable.
 */
export const VERIFICATION_ERROR_CODES = [
  // RLP header promises more bytes than the input holds.
  "truncated-input",
  // Long-form header uses more length bytes than supported.
  "length-of-length-exceeded",
  "not-a-string",
  "not-a-list",
  // A list holds more items than the decoding context allows.
  "field-count-exceeded",
  // List items do not exactly consume the declared list payload.
  "length-mismatch",
  // A field expected to carry a single-byte header uses a long header.
  "header-too-long",
  // Read outside a byte window.
  "out-of-bounds",
  "invalid-node-shape",
  "wrong-node-kind",
  "invalid-prefix",
  "invalid-padding",
  // Branch or extension child is not a 32-byte hash reference.
  "expected-hash-got-value",
  // Decoded entity has a different field count than its layout.
  "invalid-field-count",
  "unknown-transaction-type",
  "transaction-type-mismatch",
  "invalid-legacy-padding",
  "hash-mismatch",
  "path-mismatch",
  // Leaf reached before every key nibble was matched.
  "key-not-fully-consumed",
  "value-mismatch",
  "field-mismatch",
  "index-mismatch",
  "bound-exceeded",
  "invalid-depth",
] as const;

export type VerificationErrorCode = (typeof VERIFICATION_ERROR_CODES)[number];

export type VerificationErrorCategory =
  | "malformed-encoding"
  | "structural-mismatch"
  | "cryptographic-mismatch"
  | "path-mismatch"
  | "value-mismatch"
  | "bound-violation";

const CATEGORY_BY_CODE: Readonly<Record<VerificationErrorCode, VerificationErrorCategory>> = {
  "truncated-input": "malformed-encoding",
  "length-of-length-exceeded": "malformed-encoding",
  "not-a-string": "malformed-encoding",
  "not-a-list": "malformed-encoding",
  "field-count-exceeded": "malformed-encoding",
  "length-mismatch": "malformed-encoding",
  "header-too-long": "malformed-encoding",
  "out-of-bounds": "malformed-encoding",
  "invalid-node-shape": "structural-mismatch",
  "wrong-node-kind": "structural-mismatch",
  "invalid-prefix": "structural-mismatch",
  "invalid-padding": "structural-mismatch",
  "expected-hash-got-value": "structural-mismatch",
  "invalid-field-count": "structural-mismatch",
  "unknown-transaction-type": "structural-mismatch",
  "transaction-type-mismatch": "structural-mismatch",
  "invalid-legacy-padding": "structural-mismatch",
  "hash-mismatch": "cryptographic-mismatch",
  "path-mismatch": "path-mismatch",
  "key-not-fully-consumed": "path-mismatch",
  "value-mismatch": "value-mismatch",
  "field-mismatch": "value-mismatch",
  "index-mismatch": "value-mismatch",
  "bound-exceeded": "bound-violation",
  "invalid-depth": "bound-violation",
};

export function categoryOf(code: VerificationErrorCode): VerificationErrorCategory {
  return CATEGORY_BY_CODE[code];
}

export class VerificationError extends Error {
  readonly category: VerificationErrorCategory;

  constructor(
    readonly code: VerificationErrorCode,
    message: string,
    readonly field?: string
  ) {
    super(message);
    this.name = "VerificationError";
    this.category = categoryOf(code);
  }
}

export function isVerificationError(err: unknown): err is VerificationError {
  return err instanceof VerificationError;
}

// ── Result wrapper ─────────────────────────────────────────────────

export type ProofVerificationResult =
  | { valid: true; errors: [] }
  | { valid: false; errors: string[]; code: VerificationErrorCode };

/**
 * Run an asserting check and fold a `VerificationError` into a result.
 * Any other error is a bug and propagates.
 */
export function toVerificationResult(check: () => void): ProofVerificationResult {
  try {
    check();
    return { valid: true, errors: [] };
  } catch (err) {
    if (isVerificationError(err)) {
      return { valid: false, errors: [err.message], code: err.code };
    }
    throw err;
  }
}
