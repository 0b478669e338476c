import type { FastifyInstance } from "fastify";
import type { EngineDeps } from "../pipeline/run.js";
import { registerNormalizeRoutes } from "./routes.js";

export async function registerNormalizeModule(app: FastifyInstance, deps: Omit<EngineDeps, "log">) {
  await registerNormalizeRoutes(app, deps);
}
