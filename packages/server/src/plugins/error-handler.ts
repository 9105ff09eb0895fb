import fp from "fastify-plugin";
import { ZodError } from "zod";
import type { FastifyError, FastifyInstance } from "fastify";
import type { ErrorResponse } from "@neurodeck/shared";
import { ServiceError } from "../errors.js";

function isFastifyError(err: unknown): err is FastifyError & { statusCode: number } {
  return err instanceof Error && "statusCode" in err && typeof err.statusCode === "number";
}

/**
 * Maps thrown errors to `{ error, message }` bodies. Routes throw typed
 * errors and never build error replies themselves.
 */
export default fp(async function errorHandlerPlugin(fastify: FastifyInstance) {
  fastify.setErrorHandler<Error>((err, request, reply) => {
    let status: number;
    let body: ErrorResponse;

    if (err instanceof ServiceError) {
      status = err.statusCode;
      body = { error: err.code, message: err.message };
    } else if (err instanceof ZodError) {
      status = 400;
      const issues = err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
      body = {
        error: "validation_error",
        message: issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; "),
        issues,
      };
    } else if (isFastifyError(err) && (err.statusCode ?? 500) < 500) {
      // Malformed JSON, payload too large and the like
      status = err.statusCode;
      body = { error: err.code ?? "bad_request", message: err.message };
    } else {
      request.log.error({ err }, "Unhandled error");
      status = 500;
      body = { error: "internal_error", message: err.message };
    }

    if (status >= 400 && status < 500) {
      request.log.debug({ status, error: body.error }, body.message);
    }
    return reply.status(status).send(body);
  });
});
