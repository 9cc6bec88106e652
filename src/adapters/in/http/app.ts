import { Hono } from "hono";
import { logger } from "hono/logger";
import { secureHeaders } from "hono/secure-headers";
import { error, info } from "../../../config/logger.ts";
import { ApiError, createErrorResponse } from "./errors.ts";
import type { SentimentController } from "./SentimentController.ts";

/**
 * Builds the HTTP application around the sentiment routes
 */
export function createApp(controller: SentimentController): Hono {
  const app = new Hono();
  app.use(logger((message) => info(message)));
  app.use(secureHeaders());

  app.route("/", controller.createRouter());

  app.notFound((c) => {
    return c.json(createErrorResponse("Not Found"), 404);
  });

  app.onError((err, c) => {
    if (err instanceof ApiError) {
      return c.json(createErrorResponse(err.message), err.status);
    }

    error("Unhandled error", { error: err.message, stack: err.stack });
    return c.json(createErrorResponse("Internal error"), 500);
  });

  return app;
}
