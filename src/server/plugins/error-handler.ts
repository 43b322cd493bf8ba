/**
 * Fastify error handler plugin
 */

import fp from "fastify-plugin";

import type { ApiError } from "../schemas/status.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      request.log.error(error, "Unhandled error");

      const response: ApiError = {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId: request.id,
      };
      return reply.status(500).send(response);
    }
  );

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const response: ApiError = {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    };
    return reply.status(404).send(response);
  });
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
