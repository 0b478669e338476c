import { vi } from "vitest";
import type { InferenceConfig } from "../src/libs/config.js";
import type { PipelineLog } from "../src/libs/log.js";
import type { FieldValue, FlaggedItem, ShelfRecord } from "../src/modules/pipeline/types.js";
import { loadReferenceData } from "../src/modules/reference/index.js";

export const reference = loadReferenceData();

export function fakeLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies PipelineLog;
}

export function record(id: string, fields: Record<string, FieldValue>): ShelfRecord {
  return { id, fields };
}

export function inferenceConfig(overrides: Partial<InferenceConfig> = {}): InferenceConfig {
  return {
    enabled: true,
    projectId: "test-project",
    location: "us-central1",
    model: "gemini-test",
    maxBatchSize: 50,
    minBatchSize: 10,
    concurrency: 4,
    maxOutputTokens: 8192,
    retryDelayMs: 0,
    ...overrides,
  };
}

export function flaggedItems(count: number, field = "Juice Extraction Method"): FlaggedItem[] {
  return Array.from({ length: count }, (_, i) => ({
    itemId: i + 1,
    recordId: `r${i + 1}`,
    field,
    originalValue: "",
    identity: { Retailer: "Tesco" },
    context: { Brand: "Test Brand" },
    validValues: reference.schema.validValues[field] ?? null,
  }));
}

/** Item ids listed in a user prompt, in prompt order. */
export function promptItemIds(userPrompt: string): number[] {
  return [...userPrompt.matchAll(/"item": (\d+)/g)].map((m) => Number(m[1]));
}
