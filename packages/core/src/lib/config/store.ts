import { getLogger, setLogLevel } from "../logger";
import { verifierConfigSchema, type ProofBounds, type TrieKind, type VerifierConfig } from "./types";
import { DEFAULT_VERIFIER_CONFIG } from "./defaults";

const log = getLogger("config");

export interface ConfigStore {
  read(): Promise<string | null> | string | null;
  write(payload: string): Promise<void> | void;
  remove(): Promise<void> | void;
}

export type ConfigLoadWarningKind = "parse_error" | "schema_error" | "read_error";

export interface ConfigLoadWarning {
  kind: ConfigLoadWarningKind;
  message: string;
}

export interface ConfigLoadResult {
  config: VerifierConfig;
  warning?: ConfigLoadWarning;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function fallbackWith(
  fallback: VerifierConfig,
  kind: ConfigLoadWarningKind,
  message: string
): ConfigLoadResult {
  log.warn(message);
  return { config: fallback, warning: { kind, message } };
}

export async function loadVerifierConfig(
  store: ConfigStore,
  fallback: VerifierConfig = DEFAULT_VERIFIER_CONFIG
): Promise<ConfigLoadResult> {
  let raw: string | null;
  try {
    raw = await store.read();
  } catch (err) {
    return fallbackWith(fallback, "read_error", `Failed to read verifier config: ${errorMessage(err)}`);
  }

  if (!raw) return { config: fallback };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return fallbackWith(
      fallback,
      "parse_error",
      `Verifier config contains invalid JSON: ${errorMessage(err)}`
    );
  }

  const result = verifierConfigSchema.safeParse(parsed);
  if (!result.success) {
    return fallbackWith(
      fallback,
      "schema_error",
      `Verifier config failed schema validation: ${result.error.message}`
    );
  }
  return { config: result.data };
}

export async function saveVerifierConfig(store: ConfigStore, config: VerifierConfig): Promise<void> {
  const validated = verifierConfigSchema.parse(config);
  await store.write(JSON.stringify(validated, null, 2));
}

export async function resetVerifierConfig(
  store: ConfigStore,
  fallback: VerifierConfig = DEFAULT_VERIFIER_CONFIG
): Promise<VerifierConfig> {
  await store.remove();
  return fallback;
}

export function getProofBounds(
  kind: TrieKind,
  config: VerifierConfig = DEFAULT_VERIFIER_CONFIG
): ProofBounds {
  return config.bounds[kind];
}

export function applyVerifierConfig(config: VerifierConfig): void {
  setLogLevel(config.logLevel);
}
