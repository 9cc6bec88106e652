import assert from "node:assert/strict";
import { test } from "node:test";
import {
  parseLimit,
  parseSortOrder,
  shapeResult,
} from "../../../src/domain/services/resultShaper.ts";
import { SAMPLE_SENTENCES } from "../../helpers/fakes.ts";

test("shapeResult sorts ascending and truncates to the limit", () => {
  assert.deepEqual(shapeResult(SAMPLE_SENTENCES, "asc", 3), [
    { word4: -0.8 },
    { word5: 0.0 },
    { word3: 0.2 },
  ]);
});

test("shapeResult sorts descending and keeps equal scores in input order", () => {
  assert.deepEqual(shapeResult(SAMPLE_SENTENCES, "desc", 3), [
    { word1: 0.8 },
    { word2: 0.8 },
    { word3: 0.2 },
  ]);
});

test("shapeResult returns every sentence when the limit exceeds the count", () => {
  assert.deepEqual(shapeResult(SAMPLE_SENTENCES, "desc", 6), [
    { word1: 0.8 },
    { word2: 0.8 },
    { word3: 0.2 },
    { word5: 0.0 },
    { word4: -0.8 },
  ]);
});

test("shapeResult treats a negative limit as no limit", () => {
  assert.deepEqual(shapeResult(SAMPLE_SENTENCES, "desc", -1), shapeResult(SAMPLE_SENTENCES, "desc", 6));
});

test("shapeResult keeps equal scores in input order when ascending", () => {
  assert.deepEqual(shapeResult(SAMPLE_SENTENCES, "asc", -1), [
    { word4: -0.8 },
    { word5: 0.0 },
    { word3: 0.2 },
    { word1: 0.8 },
    { word2: 0.8 },
  ]);
});

test("shapeResult returns an empty list for empty input", () => {
  assert.deepEqual(shapeResult([], "desc", 3), []);
  assert.deepEqual(shapeResult([], "asc", -1), []);
});

test("shapeResult with limit 0 returns an empty list", () => {
  assert.deepEqual(shapeResult(SAMPLE_SENTENCES, "asc", 0), []);
});

test("shapeResult preserves duplicate texts positionally", () => {
  const sentences = [
    { text: "same", score: 0.1 },
    { text: "other", score: 0.5 },
    { text: "same", score: -0.3 },
  ];

  assert.deepEqual(shapeResult(sentences, "asc", -1), [
    { same: -0.3 },
    { same: 0.1 },
    { other: 0.5 },
  ]);
});

test("shapeResult does not reorder its input", () => {
  const input = [...SAMPLE_SENTENCES];
  shapeResult(input, "asc", -1);
  assert.deepEqual(input, SAMPLE_SENTENCES);
});

test("shapeResult output is stable when re-applied with the same limit", () => {
  const once = shapeResult(SAMPLE_SENTENCES, "desc", 4);
  const reshaped = shapeResult(
    once.map((entry) => {
      const [text, score] = Object.entries(entry)[0];
      return { text, score };
    }),
    "desc",
    4,
  );

  assert.deepEqual(reshaped, once);
});

test("parseSortOrder accepts desc in any case and defaults to asc", () => {
  assert.equal(parseSortOrder("desc"), "desc");
  assert.equal(parseSortOrder("DESC"), "desc");
  assert.equal(parseSortOrder("asc"), "asc");
  assert.equal(parseSortOrder("sideways"), "asc");
  assert.equal(parseSortOrder(undefined), "asc");
});

test("parseLimit defaults to -1 when absent", () => {
  assert.equal(parseLimit(undefined)._unsafeUnwrap(), -1);
  assert.equal(parseLimit("")._unsafeUnwrap(), -1);
});

test("parseLimit parses signed integers", () => {
  assert.equal(parseLimit("3")._unsafeUnwrap(), 3);
  assert.equal(parseLimit("+7")._unsafeUnwrap(), 7);
  assert.equal(parseLimit("-1")._unsafeUnwrap(), -1);
  assert.equal(parseLimit("007")._unsafeUnwrap(), 7);
});

test("parseLimit rejects non-integers", () => {
  for (const value of ["xxx", "3.5", "3abc", " 3", "1e3", "99999999999999999999"]) {
    const result = parseLimit(value);
    assert.equal(result.isErr(), true, value);
    assert.equal(result._unsafeUnwrapErr().value, value);
  }
});
