import fp from "fastify-plugin";
import type { FastifyError, FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { RetrievalFailedError } from "@geonews/retrieval";

function describeIssues(error: ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

/** Maps validation and retrieval failures onto `{ error, message }` replies. */
async function errorsPlugin(fastify: FastifyInstance) {
  fastify.setErrorHandler((error: FastifyError | ZodError | Error, request, reply) => {
    if (error instanceof ZodError) {
      const details = describeIssues(error);
      return reply.code(400).send({
        error: "InvalidInput",
        message: details.map((detail) => `${detail.path || "input"}: ${detail.message}`).join("; "),
        details
      });
    }

    if (error instanceof RetrievalFailedError) {
      request.log.error({ clusterKey: error.clusterKey, err: error.cause }, error.message);
      return reply.code(503).send({
        error: "RetrievalFailed",
        message: error.message
      });
    }

    // Malformed bodies and other client errors raised by Fastify itself
    if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: error.statusCode === 400 ? "InvalidInput" : error.name,
        message: error.message
      });
    }

    request.log.error({ err: error }, "Unhandled request error");
    return reply.code(500).send({
      error: "InternalServerError",
      message: "Unexpected error"
    });
  });
}

export default fp(errorsPlugin, {
  name: "errors"
});
