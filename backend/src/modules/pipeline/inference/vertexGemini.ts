/**
 * Gemini via Vertex AI. Low temperature, JSON output; credentials come from Application Default Credentials.
 */

import { GoogleAuth } from "google-auth-library";
import type { InferenceConfig } from "../../../libs/config.js";
import { MalformedInferenceResponseError } from "../../../libs/errors.js";
import type { InferFn, InferenceRequest, InferenceResponse } from "./types.js";

const TEMPERATURE = 0.1;

type GenerateContentResponse = {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  usageMetadata?: { promptTokenCount?: number; candidatesTokenCount?: number };
};

export function createVertexGeminiInference(config: InferenceConfig): InferFn {
  const auth = new GoogleAuth({ scopes: ["https://www.googleapis.com/auth/cloud-platform"] });

  return async (request: InferenceRequest): Promise<InferenceResponse> => {
    const { projectId, location, model } = config;
    if (!projectId) {
      throw new Error("GCP_PROJECT or GOOGLE_CLOUD_PROJECT required for Vertex AI");
    }

    const client = await auth.getClient();
    const token = await client.getAccessToken();
    if (!token.token) {
      throw new Error("Failed to get Vertex AI access token");
    }

    const url = `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${location}/publishers/google/models/${model}:generateContent`;
    const body = {
      contents: [{ role: "user", parts: [{ text: request.userPrompt }] }],
      system_instruction: { parts: [{ text: request.systemPrompt }] },
      generationConfig: {
        maxOutputTokens: config.maxOutputTokens,
        temperature: TEMPERATURE,
        responseMimeType: "application/json",
      },
    };

    const res = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${token.token}`,
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const errText = await res.text();
      throw new Error(`Vertex AI error ${res.status}: ${errText}`);
    }

    const data = (await res.json()) as GenerateContentResponse;
    const candidate = data.candidates?.[0];
    const truncated = candidate?.finishReason === "MAX_TOKENS";
    const text = (candidate?.content?.parts ?? []).map((p) => p.text ?? "").join("");
    if (text.trim() === "") {
      throw new MalformedInferenceResponseError("Vertex AI returned no text", truncated);
    }
    return {
      text,
      truncated,
      usage: {
        inputTokens: data.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: data.usageMetadata?.candidatesTokenCount ?? 0,
      },
    };
  };
}
