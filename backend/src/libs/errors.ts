import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

export type AppErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_REFERENCE_DATA"
  | "UNDECIDED_OVERLAP"
  | "INTERNAL";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  constructor(opts: { statusCode: number; code: AppErrorCode; message: string; details?: unknown }) {
    super(opts.message);
    this.statusCode = opts.statusCode;
    this.code = opts.code;
    this.details = opts.details;
  }
}

/**
 * Raised by an inference adapter when the model reply cannot be used as structured output
 * (cut off by the token limit, not JSON, not an array). Batch resolution splits on this.
 */
export class MalformedInferenceResponseError extends Error {
  public readonly truncated: boolean;

  constructor(message: string, truncated = false) {
    super(message);
    this.name = "MalformedInferenceResponseError";
    this.truncated = truncated;
  }
}

export function assertUnreachable(x: never): never {
  throw new AppError({ statusCode: 500, code: "INTERNAL", message: `Unreachable: ${String(x)}` });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function setErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((err: FastifyError | AppError, req: FastifyRequest, reply: FastifyReply) => {
    const requestId = req.id;

    // Fastify schema validation error
    if ("validation" in err && err.validation) {
      reply.status(400).send({
        requestId,
        error: { code: "VALIDATION_ERROR", message: "Invalid request", details: err.validation },
      });
      return;
    }

    if (err instanceof AppError) {
      reply.status(err.statusCode).send({
        requestId,
        error: { code: err.code, message: err.message, details: err.details },
      });
      return;
    }

    req.log.error({ err }, "Unhandled error");
    reply.status(500).send({
      requestId,
      error: { code: "INTERNAL", message: "Internal server error" },
    });
  });
}
