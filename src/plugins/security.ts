import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";

// JSON only: nothing here should ever be rendered, framed or scripted.
const API_CSP = ["default-src 'none'", "frame-ancestors 'none'", "base-uri 'none'", "form-action 'none'"].join("; ");

const ADDITIONAL_HEADERS: Record<string, string> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "Referrer-Policy": "no-referrer",
  "Cross-Origin-Resource-Policy": "same-origin",
  "Cache-Control": "no-store"
};

export type SecurityHeadersOptions = {
  dev: boolean;
};

const securityHeadersPlugin: FastifyPluginCallback<SecurityHeadersOptions> = (app, { dev }, done) => {
  app.addHook("onRequest", (_request, reply, hookDone) => {
    reply.header("Content-Security-Policy", API_CSP);
    if (!dev) {
      reply.header("Strict-Transport-Security", "max-age=63072000; includeSubDomains");
    }

    for (const [header, value] of Object.entries(ADDITIONAL_HEADERS)) {
      reply.header(header, value);
    }

    hookDone();
  });

  done();
};

export default fp(securityHeadersPlugin, {
  name: "security-headers"
});
