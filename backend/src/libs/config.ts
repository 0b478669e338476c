/**
 * Engine configuration, read once at startup from process.env (dotenv is loaded by server.ts).
 * Secrets and project ids are never hardcoded.
 */

export const DEFAULT_LOCATION = "us-central1";
export const DEFAULT_MODEL = "gemini-1.5-flash";

/** At most this many flagged items per inference call. */
export const DEFAULT_MAX_BATCH_SIZE = 50;
/** A batch at or below this size that still fails to parse is given up on. */
export const DEFAULT_MIN_BATCH_SIZE = 10;
export const DEFAULT_INFERENCE_CONCURRENCY = 4;
export const DEFAULT_MAX_OUTPUT_TOKENS = 8192;
/** Wait before the single retry of a failed inference call. */
export const DEFAULT_RETRY_DELAY_MS = 2000;

export type InferenceConfig = {
  /** False when no GCP project is configured or INFERENCE_DISABLED=true; the external phase is then skipped. */
  enabled: boolean;
  projectId: string | null;
  location: string;
  model: string;
  maxBatchSize: number;
  minBatchSize: number;
  concurrency: number;
  maxOutputTokens: number;
  retryDelayMs: number;
};

export type EngineConfig = {
  port: number;
  referenceDataDir: string | null;
  inference: InferenceConfig;
};

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw.trim());
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function nonEmpty(raw: string | undefined): string | null {
  const v = raw?.trim();
  return v ? v : null;
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const projectId = nonEmpty(env.GCP_PROJECT) ?? nonEmpty(env.GOOGLE_CLOUD_PROJECT);
  const disabled = env.INFERENCE_DISABLED?.trim().toLowerCase() === "true";

  const maxBatchSize = positiveInt(env.INFERENCE_BATCH_SIZE, DEFAULT_MAX_BATCH_SIZE);
  // floor can never exceed the cap, otherwise nothing would ever split
  const minBatchSize = Math.min(positiveInt(env.INFERENCE_MIN_BATCH_SIZE, DEFAULT_MIN_BATCH_SIZE), maxBatchSize);

  return {
    port: positiveInt(env.PORT, 8080),
    referenceDataDir: nonEmpty(env.REFERENCE_DATA_DIR),
    inference: {
      enabled: projectId != null && !disabled,
      projectId,
      location: nonEmpty(env.VERTEX_AI_LOCATION) ?? DEFAULT_LOCATION,
      model: nonEmpty(env.GEMINI_MODEL) ?? DEFAULT_MODEL,
      maxBatchSize,
      minBatchSize,
      concurrency: positiveInt(env.INFERENCE_CONCURRENCY, DEFAULT_INFERENCE_CONCURRENCY),
      maxOutputTokens: positiveInt(env.INFERENCE_MAX_OUTPUT_TOKENS, DEFAULT_MAX_OUTPUT_TOKENS),
      retryDelayMs: positiveInt(env.INFERENCE_RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    },
  };
}
