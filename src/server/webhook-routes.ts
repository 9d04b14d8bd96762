import type { FastifyPluginAsync } from "fastify";
import type { JobQueue } from "../jobs/queue.js";
import type { Logger } from "../logger.js";
import type { RsvpJob } from "../rsvp/reconciler.js";
import { parseNotificationBatch } from "../webhook/notifications.js";
import { firstString, type QueryString } from "./query.js";

/** Graph batches can run well past Fastify's 1 MiB default. */
export const WEBHOOK_BODY_LIMIT = 16 * 1024 * 1024;

export interface WebhookRouteOptions {
  path: string;
  clientState: string;
  queue: JobQueue<RsvpJob>;
  logger: Logger;
  bodyLimit?: number;
}

/**
 * Graph change-notification endpoint. Answers the validation handshake with
 * the token as plain text, and everything else with 202 once the
 * notifications are queued; payload problems never change the status code.
 */
export const webhookRoutes: FastifyPluginAsync<WebhookRouteOptions> = async (app, options) => {
  const { logger, queue } = options;

  // Raw text for every content type, so a malformed body reaches the handler.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  // Parser failures (oversized or unreadable bodies) still answer 202.
  app.setErrorHandler(async (error, request, reply) => {
    logger.error(
      { path: request.url, statusCode: error.statusCode, code: error.code, err: error },
      "Webhook request error",
    );
    return reply.code(202).type("text/plain").send("Accepted");
  });

  app.route<{ Querystring: QueryString; Body: unknown }>({
    method: ["GET", "POST"],
    url: options.path,
    bodyLimit: options.bodyLimit ?? WEBHOOK_BODY_LIMIT,
    handler: async (request, reply) => {
      const validationToken = firstString(request.query.validationToken);
      if (validationToken !== undefined) {
        logger.info("Graph subscription validation handshake received");
        return reply.code(200).type("text/plain").send(validationToken);
      }

      try {
        const batch = parseNotificationBatch(request.body);
        for (const notification of batch.notifications) {
          if (notification.clientState !== undefined && notification.clientState !== options.clientState) {
            logger.warn(
              { subscriptionId: notification.subscriptionId },
              "Graph notification clientState mismatch",
            );
          }
          queue.enqueue({ resource: notification.resource });
        }
        logger.debug(
          { queued: batch.notifications.length, skipped: batch.skipped },
          "Graph notifications accepted",
        );
      } catch (error) {
        logger.error({ err: error }, "Webhook payload error");
      }

      return reply.code(202).type("text/plain").send("Accepted");
    },
  });
};
