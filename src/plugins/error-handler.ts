import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";

const clientErrorCodes: Record<number, string> = {
  400: "INVALID_REQUEST",
  404: "NOT_FOUND",
  413: "PAYLOAD_TOO_LARGE",
  415: "UNSUPPORTED_MEDIA_TYPE"
};

const errorHandlerPlugin: FastifyPluginCallback = (app, _opts, done) => {
  app.setErrorHandler((error, request, reply) => {
    if (request.raw.aborted || request.raw.destroyed) {
      reply.status(499).send({ error: "CLIENT_CLOSED_REQUEST" });
      return;
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      reply.status(statusCode).send({ error: clientErrorCodes[statusCode] ?? "BAD_REQUEST" });
      return;
    }

    request.log.error({ err: error }, "Unhandled error");
    reply.status(500).send({ error: "INTERNAL_SERVER_ERROR" });
  });

  done();
};

export default fp(errorHandlerPlugin, { name: "error-handler" });
