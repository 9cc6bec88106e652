import { err, fromThrowable, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { SentimentResult } from "../../domain/models/sentiment.ts";

export type CodecError =
  | { type: "encode"; message: string }
  | { type: "decode"; message: string };

const storedResultSchema = z.object({
  sentences: z.array(
    z.object({
      text: z.string(),
      score: z.number(),
      magnitude: z.number().optional(),
    }),
  ),
  language: z.string().optional(),
});

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Serializes a provider result to UTF-8 JSON bytes for storage in the cache.
 */
export function encodeResult(result: SentimentResult): Result<Uint8Array, CodecError> {
  // JSON has no representation for NaN or Infinity
  const unrepresentable = result.sentences.find((sentence) =>
    !Number.isFinite(sentence.score) ||
    (sentence.magnitude !== undefined && !Number.isFinite(sentence.magnitude))
  );
  if (unrepresentable) {
    return err({
      type: "encode",
      message: `Non-finite value in sentence "${unrepresentable.text}"`,
    });
  }

  const payload = {
    sentences: result.sentences.map(({ text, score, magnitude }) => ({ text, score, magnitude })),
    language: result.language,
  };

  return fromThrowable(
    () => encoder.encode(JSON.stringify(payload)),
    (e): CodecError => ({ type: "encode", message: describe(e) }),
  )();
}

/**
 * Restores a provider result from cached bytes.
 * Fails on invalid UTF-8, invalid JSON, or an unexpected shape.
 */
export function decodeResult(bytes: Uint8Array): Result<SentimentResult, CodecError> {
  return fromThrowable(
    (): unknown => JSON.parse(decoder.decode(bytes)),
    (e): CodecError => ({ type: "decode", message: describe(e) }),
  )().andThen((raw): Result<SentimentResult, CodecError> => {
    const parsed = storedResultSchema.safeParse(raw);
    if (!parsed.success) {
      return err({
        type: "decode",
        message: parsed.error.issues.map((issue) => issue.message).join(", "),
      });
    }
    return ok(parsed.data);
  });
}
