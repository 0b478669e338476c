import pLimit from "p-limit";
import type { InferenceConfig } from "../../../libs/config.js";
import type { PipelineLog } from "../../../libs/log.js";
import type { ReferenceData } from "../../reference/index.js";
import type { FlaggedItem } from "../types.js";
import { partition, resolveBatch, type BatchContext } from "./batches.js";
import type { ExternalResolution, InferFn, InferenceStats } from "./types.js";

export { createVertexGeminiInference } from "./vertexGemini.js";
export { parseInferenceResponse, validateAnswers } from "./safeguards.js";
export { partition, splitInHalf, resolveBatch } from "./batches.js";
export { SYSTEM_PROMPT, buildUserPrompt } from "./prompt.js";
export type {
  AcceptedAnswer,
  ExternalResolution,
  InferFn,
  InferenceRequest,
  InferenceResponse,
  InferenceStats,
  RejectedAnswer,
} from "./types.js";

function emptyStats(): InferenceStats {
  return { batches: 0, calls: 0, retries: 0, splits: 0, failedBatches: 0, inputTokens: 0, outputTokens: 0 };
}

/**
 * Resolve flagged items through the external model. Top-level batches run concurrently up to
 * `config.concurrency`; this returns only after every batch and sub-batch has finished.
 * With no inference function (or inference disabled) nothing is called and every item stays unresolved.
 */
export async function resolveFlaggedItems(
  items: readonly FlaggedItem[],
  deps: { infer: InferFn | null; config: InferenceConfig; reference: ReferenceData; log: PipelineLog },
): Promise<ExternalResolution> {
  const stats = emptyStats();
  const result: ExternalResolution = { skipped: false, accepted: [], blank: [], rejected: [], failed: new Map(), stats };
  if (items.length === 0) return result;

  const { infer, config, reference, log } = deps;
  if (!infer || !config.enabled) {
    log.warn({ items: items.length }, "External inference not configured; flagged fields stay unresolved");
    return { ...result, skipped: true };
  }

  const batches = partition(items, config.maxBatchSize);
  stats.batches = batches.length;
  const ctx: BatchContext = {
    infer,
    reference,
    minBatchSize: config.minBatchSize,
    retryDelayMs: config.retryDelayMs,
    stats,
    log,
  };
  const limit = pLimit(Math.max(1, Math.floor(config.concurrency)));
  const outcomes = await Promise.all(batches.map((batch) => limit(() => resolveBatch(batch, ctx))));

  for (const o of outcomes) {
    result.accepted.push(...o.accepted);
    result.blank.push(...o.blank);
    result.rejected.push(...o.rejected);
    for (const [id, reason] of o.failed) result.failed.set(id, reason);
  }
  log.info(
    { ...stats, accepted: result.accepted.length, blank: result.blank.length, rejected: result.rejected.length },
    "External inference finished",
  );
  return result;
}
