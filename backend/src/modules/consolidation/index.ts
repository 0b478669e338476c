import type { FastifyInstance } from "fastify";
import type { ReferenceData } from "../reference/index.js";
import { registerConsolidationRoutes } from "./routes.js";

export { MASTER_SOURCE, applyOverlapDecisions, consolidate, detectOverlaps, storeKey } from "./merge.js";
export type {
  ConsolidatedRecord,
  ConsolidationPlan,
  ConsolidationResult,
  DecisionLogEntry,
  IncomingFile,
  OverlapDecision,
  OverlapGroup,
} from "./merge.js";

export async function registerConsolidationModule(app: FastifyInstance, deps: { reference: ReferenceData }) {
  await registerConsolidationRoutes(app, deps);
}
