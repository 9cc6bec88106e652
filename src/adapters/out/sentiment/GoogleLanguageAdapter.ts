import { err, errAsync, fromThrowable, ok, okAsync, type Result, ResultAsync } from "neverthrow";
import { z } from "zod";
import type { SentimentProviderPort } from "../../../application/ports/out/SentimentProviderPort.ts";
import type { ProviderError, SentimentResult } from "../../../domain/models/sentiment.ts";

export const LANGUAGE_API_ENDPOINT =
  "https://language.googleapis.com/v1/documents:analyzeSentiment";
const DEFAULT_RETRY_AFTER_MS = 60_000;

// Proto3 JSON omits zero values, so scores and magnitudes may be missing
const analyzeSentimentResponseSchema = z.object({
  language: z.string().optional(),
  sentences: z.array(
    z.object({
      text: z.object({
        content: z.string().default(""),
        beginOffset: z.number().optional(),
      }).default({}),
      sentiment: z.object({
        magnitude: z.number().default(0),
        score: z.number().default(0),
      }).default({}),
    }),
  ).default([]),
});

type AnalyzeSentimentResponse = z.infer<typeof analyzeSentimentResponseSchema>;

const apiErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

/**
 * Sentiment provider backed by the Google Cloud Natural Language REST API
 */
export class GoogleLanguageAdapter implements SentimentProviderPort {
  readonly name = "google-language";
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(
    private readonly apiKey: string,
    private readonly endpoint: string = LANGUAGE_API_ENDPOINT,
  ) {}

  async analyze(
    text: string,
    signal?: AbortSignal,
  ): Promise<Result<SentimentResult, ProviderError>> {
    if (this.closed) {
      return err({ type: "network", message: "Client is closed" });
    }

    const controller = new AbortController();
    this.inFlight.add(controller);
    const callSignal = signal ? AbortSignal.any([signal, controller.signal]) : controller.signal;

    try {
      return await this.requestSentiment(text, callSignal)
        .map((response) => this.mapResponse(response));
    } finally {
      this.inFlight.delete(controller);
    }
  }

  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort(new Error("Client closed"));
    }
    this.inFlight.clear();
  }

  private requestSentiment(
    text: string,
    signal: AbortSignal,
  ): ResultAsync<AnalyzeSentimentResponse, ProviderError> {
    const url = `${this.endpoint}?key=${encodeURIComponent(this.apiKey)}`;

    return ResultAsync.fromPromise(
      fetch(url, {
        method: "POST",
        headers: {
          "Accept": "application/json",
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          document: { type: "PLAIN_TEXT", content: text },
          encodingType: "UTF8",
        }),
        signal,
      }),
      (e): ProviderError => this.toRequestError(e, signal),
    )
      .andThen((response) => this.ensureOk(response))
      .andThen((response) =>
        ResultAsync.fromPromise<unknown, ProviderError>(
          response.json(),
          () => ({ type: "invalidResponse", message: "Failed to parse API response" }),
        )
      )
      .andThen((body) => this.parseResponse(body));
  }

  private toRequestError(e: unknown, signal: AbortSignal): ProviderError {
    if (signal.aborted) {
      const reason: unknown = signal.reason;
      if (
        typeof reason === "object" &&
        reason !== null &&
        "name" in reason &&
        reason.name === "TimeoutError"
      ) {
        return { type: "timeout", message: "Request timed out" };
      }
      return { type: "network", message: "Request aborted" };
    }

    return {
      type: "network",
      message: e instanceof Error ? e.message : "Unknown error",
    };
  }

  private ensureOk(response: Response): ResultAsync<Response, ProviderError> {
    if (response.ok) {
      return okAsync<Response, ProviderError>(response);
    }

    return ResultAsync.fromPromise(response.text(), () => "Error reading response text")
      .orElse(() => okAsync<string, ProviderError>(""))
      .andThen((body) =>
        errAsync<Response, ProviderError>(
          this.statusToError(response.status, response.headers.get("retry-after"), body),
        )
      );
  }

  private statusToError(status: number, retryAfter: string | null, body: string): ProviderError {
    const detail = this.extractErrorMessage(body);

    if (status === 400) {
      return {
        type: "invalidInput",
        message: "API rejected the document",
        issues: detail ? [detail] : [],
      };
    }

    if (status === 401 || status === 403) {
      return {
        type: "authorization",
        message: `API Key authentication error: ${status}`,
      };
    }

    if (status === 429) {
      const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
      return {
        type: "rateLimit",
        message: "Rate limit exceeded",
        retryAfterMs: Number.isNaN(seconds) ? DEFAULT_RETRY_AFTER_MS : seconds * 1000,
      };
    }

    return {
      type: "network",
      message: `API call error: ${status}`,
    };
  }

  private extractErrorMessage(body: string): string | undefined {
    if (!body) return undefined;

    const json = fromThrowable((): unknown => JSON.parse(body), () => "invalid json")();
    if (json.isErr()) {
      return body.trim() || undefined;
    }

    const parsed = apiErrorSchema.safeParse(json.value);
    return parsed.success ? parsed.data.error.message : undefined;
  }

  private parseResponse(body: unknown): Result<AnalyzeSentimentResponse, ProviderError> {
    const parsed = analyzeSentimentResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err({
        type: "invalidResponse",
        message: `Unexpected API response: ${parsed.error.issues.map((i) => i.message).join(", ")}`,
      });
    }
    return ok(parsed.data);
  }

  private mapResponse(response: AnalyzeSentimentResponse): SentimentResult {
    return {
      language: response.language,
      sentences: response.sentences.map((sentence) => ({
        text: sentence.text.content,
        score: sentence.sentiment.score,
        magnitude: sentence.sentiment.magnitude,
      })),
    };
  }
}
