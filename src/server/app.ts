import Fastify, { type FastifyInstance } from "fastify";
import type { OAuthCallbackParams, OAuthCallbackResult } from "../auth/callback.js";
import type { JobQueue } from "../jobs/queue.js";
import type { Logger } from "../logger.js";
import type { RsvpJob } from "../rsvp/reconciler.js";
import { firstString, type QueryString } from "./query.js";
import { webhookRoutes } from "./webhook-routes.js";

export interface ServerDeps {
  webhookPath: string;
  oauthRedirectPath: string;
  webhookClientState: string;
  rsvpQueue: JobQueue<RsvpJob>;
  completeLogin: (params: OAuthCallbackParams) => Promise<OAuthCallbackResult>;
  logger: Logger;
  webhookBodyLimit?: number;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  app.setErrorHandler(async (error, request, reply) => {
    deps.logger.error(
      { path: request.url, method: request.method, err: error },
      "Request error",
    );
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    return reply.status(statusCode).send({ error: statusCode < 500 ? error.message : "Internal error" });
  });

  await app.register(webhookRoutes, {
    path: deps.webhookPath,
    clientState: deps.webhookClientState,
    queue: deps.rsvpQueue,
    logger: deps.logger,
    bodyLimit: deps.webhookBodyLimit,
  });

  app.get("/health", async () => ({ status: "ok" }));

  app.get<{ Querystring: QueryString }>(deps.oauthRedirectPath, async (request, reply) => {
    const query = request.query;
    const result = await deps.completeLogin({
      code: firstString(query.code),
      state: firstString(query.state),
      error: firstString(query.error),
      errorDescription: firstString(query.error_description),
    });

    if (result.type === "bad_request") {
      return reply.code(400).type("text/plain").send(result.message);
    }
    return reply.redirect(result.location);
  });

  return app;
}
