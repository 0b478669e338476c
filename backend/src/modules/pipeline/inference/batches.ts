/**
 * Batch partitioning and split-and-retry. A batch whose reply is truncated or unparsable is halved
 * and each half re-sent, down to the floor. A failed transport call is retried once after a delay,
 * then the whole batch fails without splitting.
 */

import { MalformedInferenceResponseError, errorMessage } from "../../../libs/errors.js";
import type { PipelineLog } from "../../../libs/log.js";
import type { ReferenceData } from "../../reference/index.js";
import type { FlaggedItem } from "../types.js";
import { SYSTEM_PROMPT, buildUserPrompt } from "./prompt.js";
import { parseInferenceResponse, validateAnswers, type ValidatedAnswers } from "./safeguards.js";
import type { InferFn, InferenceRequest, InferenceResponse, InferenceStats } from "./types.js";

export function partition<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/** First half gets the extra item when the length is odd. */
export function splitInHalf<T>(items: readonly T[]): [T[], T[]] {
  const mid = Math.ceil(items.length / 2);
  return [items.slice(0, mid), items.slice(mid)];
}

export type BatchOutcome = ValidatedAnswers & {
  /** itemId -> failure reason for items whose batch never produced a usable reply */
  failed: Map<number, string>;
};

export type BatchContext = {
  infer: InferFn;
  reference: ReferenceData;
  minBatchSize: number;
  retryDelayMs: number;
  stats: InferenceStats;
  log: PipelineLog;
};

function failAll(batch: readonly FlaggedItem[], reason: string): BatchOutcome {
  return { accepted: [], blank: [], rejected: [], failed: new Map(batch.map((i) => [i.itemId, reason])) };
}

function combine(a: BatchOutcome, b: BatchOutcome): BatchOutcome {
  return {
    accepted: [...a.accepted, ...b.accepted],
    blank: [...a.blank, ...b.blank],
    rejected: [...a.rejected, ...b.rejected],
    failed: new Map([...a.failed, ...b.failed]),
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

async function callWithRetry(request: InferenceRequest, size: number, ctx: BatchContext): Promise<InferenceResponse> {
  ctx.stats.calls += 1;
  try {
    return await ctx.infer(request);
  } catch (err) {
    if (err instanceof MalformedInferenceResponseError) throw err;
    ctx.stats.retries += 1;
    ctx.log.warn({ err, size, delayMs: ctx.retryDelayMs }, "Inference call failed; retrying once");
    await sleep(ctx.retryDelayMs);
    ctx.stats.calls += 1;
    return await ctx.infer(request);
  }
}

/** Sub-batches run sequentially inside the caller's concurrency slot. */
export async function resolveBatch(batch: readonly FlaggedItem[], ctx: BatchContext): Promise<BatchOutcome> {
  let malformed: string;
  try {
    const request = { systemPrompt: SYSTEM_PROMPT, userPrompt: buildUserPrompt(batch) };
    const response = await callWithRetry(request, batch.length, ctx);
    ctx.stats.inputTokens += response.usage?.inputTokens ?? 0;
    ctx.stats.outputTokens += response.usage?.outputTokens ?? 0;
    const entries = response.truncated ? null : parseInferenceResponse(response.text);
    if (entries) {
      return { ...validateAnswers(entries, batch, ctx.reference), failed: new Map() };
    }
    malformed = response.truncated ? "response truncated at the output token limit" : "response is not a JSON array";
  } catch (err) {
    if (!(err instanceof MalformedInferenceResponseError)) {
      ctx.stats.failedBatches += 1;
      ctx.log.error({ err, size: batch.length }, "Inference call failed; batch left unresolved");
      return failAll(batch, `inference call failed: ${errorMessage(err)}`);
    }
    malformed = err.truncated ? "response truncated at the output token limit" : err.message;
  }

  if (batch.length <= ctx.minBatchSize) {
    ctx.stats.failedBatches += 1;
    ctx.log.error({ size: batch.length, reason: malformed }, "Inference batch at minimum size still malformed; giving up");
    return failAll(batch, malformed);
  }

  const [left, right] = splitInHalf(batch);
  ctx.stats.splits += 1;
  ctx.log.warn(
    { size: batch.length, left: left.length, right: right.length, reason: malformed },
    "Inference batch malformed; splitting",
  );
  const first = await resolveBatch(left, ctx);
  const second = await resolveBatch(right, ctx);
  return combine(first, second);
}
