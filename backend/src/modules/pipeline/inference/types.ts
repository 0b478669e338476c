export type InferenceRequest = {
  systemPrompt: string;
  userPrompt: string;
};

export type InferenceUsage = {
  inputTokens: number;
  outputTokens: number;
};

export type InferenceResponse = {
  text: string;
  /** Output hit the token limit; the text is not trusted even if it happens to parse. */
  truncated: boolean;
  usage?: InferenceUsage;
};

/**
 * One call to the external model. Throws MalformedInferenceResponseError when the reply is unusable,
 * any other error when the call itself failed.
 */
export type InferFn = (request: InferenceRequest) => Promise<InferenceResponse>;

/** One entry of the model's JSON array, after shape checks. */
export type InferenceAnswer = {
  itemId: number;
  value: string;
  rationale: string;
};

export type AcceptedAnswer = InferenceAnswer & { field: string; recordId: string };

export type RejectedAnswer = {
  itemId: number | null;
  value: string;
  reason: string;
};

export type InferenceStats = {
  batches: number;
  calls: number;
  /** transport failures retried once after a delay */
  retries: number;
  splits: number;
  failedBatches: number;
  inputTokens: number;
  outputTokens: number;
};

export type ExternalResolution = {
  /** true when no inference function is configured; every flagged item then stays unresolved */
  skipped: boolean;
  accepted: AcceptedAnswer[];
  /** answered blank or with an unknown sentinel */
  blank: AcceptedAnswer[];
  rejected: RejectedAnswer[];
  /** itemId -> why its batch produced nothing */
  failed: Map<number, string>;
  stats: InferenceStats;
};
