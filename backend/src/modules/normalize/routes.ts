import type { FastifyInstance } from "fastify";
import { runNormalization, type EngineDeps } from "../pipeline/run.js";
import { normalizeBodySchema, toShelfRecords, type NormalizeBody } from "./dto.js";

export async function registerNormalizeRoutes(app: FastifyInstance, deps: Omit<EngineDeps, "log">) {
  app.post<{ Body: NormalizeBody }>(
    "/normalize",
    { schema: { body: normalizeBodySchema } },
    async (req) => {
      const sources = req.body.sources.map((s) => ({
        sourceName: s.sourceName,
        market: s.market,
        records: toShelfRecords(s.sourceName, s.records),
      }));
      const run = await runNormalization(sources, { ...deps, log: req.log });
      return { requestId: req.id, ...run };
    },
  );
}
