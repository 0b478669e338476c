import Fastify from "fastify";
import type { EngineConfig } from "./libs/config.js";
import { setErrorHandler } from "./libs/errors.js";
import { registerConsolidationModule } from "./modules/consolidation/index.js";
import { registerNormalizeModule } from "./modules/normalize/index.js";
import { createVertexGeminiInference, type InferFn } from "./modules/pipeline/inference/index.js";
import { loadReferenceData, type ReferenceData } from "./modules/reference/index.js";

export type BuildAppOptions = {
  config: EngineConfig;
  /** Defaults to the files under REFERENCE_DATA_DIR (or backend/data). */
  reference?: ReferenceData;
  /** Defaults to Vertex AI Gemini when inference is enabled; tests pass a fake. */
  infer?: InferFn | null;
  logger?: boolean;
};

export async function buildApp(opts: BuildAppOptions) {
  const app = Fastify({
    logger: opts.logger ?? true,
    trustProxy: true,
    // whole survey files arrive in one body
    bodyLimit: 25 * 1024 * 1024,
    // cells are string | number | null
    ajv: { customOptions: { allowUnionTypes: true } },
  });

  setErrorHandler(app);

  const { config } = opts;
  const reference = opts.reference ?? loadReferenceData(config.referenceDataDir ?? undefined);
  const infer =
    opts.infer !== undefined ? opts.infer : config.inference.enabled ? createVertexGeminiInference(config.inference) : null;
  if (!infer || !config.inference.enabled) {
    app.log.warn("External inference disabled; flagged fields will be left for manual review");
  }

  // Health
  app.get("/healthz", async (req) => ({
    ok: true,
    requestId: req.id,
    inferenceAvailable: infer != null && config.inference.enabled,
  }));

  await registerNormalizeModule(app, { reference, inference: config.inference, infer });
  await registerConsolidationModule(app, { reference });

  return app;
}
