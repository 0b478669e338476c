/**
 * Structural logger accepted by every pipeline stage. Fastify's pino instance (`app.log`)
 * satisfies it; tests pass plain spies.
 */
export type PipelineLog = {
  debug: (o: unknown, msg: string) => void;
  info: (o: unknown, msg: string) => void;
  warn: (o: unknown, msg: string) => void;
  error: (o: unknown, msg: string) => void;
};
