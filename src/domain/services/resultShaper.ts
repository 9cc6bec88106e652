import { err, ok, type Result } from "neverthrow";
import type { Sentence, SentimentResponse, SortOrder } from "../models/sentiment.ts";

export type LimitParseError = { type: "invalidLimit"; message: string; value: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Comparator ordering sentences by score in the given direction.
 * Equal scores compare as 0, so a stable sort keeps their input order.
 */
export function compareByScore(order: SortOrder): (a: Sentence, b: Sentence) => number {
  const direction = order === "asc" ? 1 : -1;
  return (a, b) => {
    if (a.score === b.score) return 0;
    return a.score < b.score ? -direction : direction;
  };
}

/**
 * Sorts, truncates and projects sentences into the response shape.
 * A negative limit keeps every sentence. The input array is left untouched.
 */
export function shapeResult(
  sentences: ReadonlyArray<Sentence>,
  order: SortOrder,
  limit: number,
): SentimentResponse {
  const sorted = [...sentences].sort(compareByScore(order));
  const retained = limit < 0 ? sorted : sorted.slice(0, limit);

  return retained.map((sentence) => ({ [sentence.text]: sentence.score }));
}

export function parseSortOrder(value?: string): SortOrder {
  return value?.toLowerCase() === "desc" ? "desc" : "asc";
}

/**
 * Parses the `limit` query parameter. Absent or empty means no limit (-1).
 */
export function parseLimit(value?: string): Result<number, LimitParseError> {
  if (value === undefined || value === "") {
    return ok(-1);
  }

  const parsed = Number(value);
  if (!INTEGER_PATTERN.test(value) || !Number.isSafeInteger(parsed)) {
    return err({
      type: "invalidLimit",
      message: `limit must be an integer, got "${value}"`,
      value,
    });
  }

  return ok(parsed);
}
