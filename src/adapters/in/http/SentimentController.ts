import { type Context, Hono } from "hono";
import { z } from "zod";
import type { SentimentUseCase } from "../../../application/ports/in/SentimentUseCase.ts";
import {
  getErrorStatusCode,
  sentimentErrorToDomainError,
} from "../../../domain/models/errors.ts";
import type { SentimentError } from "../../../domain/models/sentiment.ts";
import { parseLimit, parseSortOrder } from "../../../domain/services/resultShaper.ts";
import { error, warn } from "../../../config/logger.ts";
import { domainErrorToApiError, domainErrorToResponse } from "./errors.ts";

/**
 * Controller for the sentiment HTTP endpoints
 */
export class SentimentController {
  // A null body or a missing or null `content` field reads as empty text
  private readonly requestSchema = z.object({
    content: z.string().nullish(),
  }).nullable();

  constructor(private readonly sentimentUseCase: SentimentUseCase) {}

  createRouter(): Hono {
    const router = new Hono();

    router.post("/api", (c) => this.handleSentimentRequest(c));

    router.all("/api", (c) => {
      warn("Bad request method", { method: c.req.method });
      c.header("Allow", "POST");
      throw domainErrorToApiError({ type: "method_not_allowed", message: "Bad request method" });
    });

    // Liveness probe
    router.all("/status", (c) => c.body(null, 200));

    return router;
  }

  private async handleSentimentRequest(c: Context): Promise<Response> {
    const content = await this.parseContent(c);

    const order = parseSortOrder(c.req.query("order"));
    const limit = parseLimit(c.req.query("limit")).match(
      (value) => value,
      (limitError) => {
        warn("Invalid limit parameter", { limit: limitError.value, error: limitError.message });
        return -1;
      },
    );

    const result = await this.sentimentUseCase.handle(c.req.raw.signal, content, order, limit);

    return result.match(
      (response) => c.json(response),
      (sentimentError) => this.handleSentimentError(c, sentimentError),
    );
  }

  private async parseContent(c: Context): Promise<string> {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (e) {
      error("Failed to parse request body", {
        error: e instanceof Error ? e.message : String(e),
      });
      throw domainErrorToApiError({ type: "parse", message: "Bad request" });
    }

    const parsed = this.requestSchema.safeParse(body);
    if (!parsed.success) {
      error("Failed to parse request body", {
        error: parsed.error.issues.map((issue) => issue.message).join(", "),
      });
      throw domainErrorToApiError({ type: "validation", message: "Bad request" });
    }

    return parsed.data?.content ?? "";
  }

  private handleSentimentError(c: Context, sentimentError: SentimentError): Response {
    error("Request failed", { type: sentimentError.type, error: sentimentError.message });
    const domainError = sentimentErrorToDomainError(sentimentError);
    return c.json(domainErrorToResponse(domainError), getErrorStatusCode(domainError));
  }
}
