import type { Result } from "neverthrow";
import type {
  SentimentError,
  SentimentResponse,
  SortOrder,
} from "../../../domain/models/sentiment.ts";

/**
 * Input port for sentiment analysis
 * Defines the operation that controllers call with a caller-owned abort signal
 */
export interface SentimentUseCase {
  handle(
    signal: AbortSignal,
    content: string,
    order: SortOrder,
    limit: number,
  ): Promise<Result<SentimentResponse, SentimentError>>;
}
