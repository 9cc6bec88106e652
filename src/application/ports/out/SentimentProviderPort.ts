import type { Result } from "neverthrow";
import type { ProviderError, SentimentResult } from "../../../domain/models/sentiment.ts";

/**
 * Output port for the remote sentiment-analysis provider
 */
export interface SentimentProviderPort {
  readonly name: string;

  /**
   * Analyzes `text` and returns its scored sentences.
   * Aborting `signal` cancels the remote call.
   */
  analyze(text: string, signal?: AbortSignal): Promise<Result<SentimentResult, ProviderError>>;

  /**
   * Aborts in-flight calls and rejects new ones.
   */
  close(): void;
}
