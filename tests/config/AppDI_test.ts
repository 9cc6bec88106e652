import assert from "node:assert/strict";
import { test } from "node:test";
import { initializeAdapters } from "../../src/config/adapters.ts";
import { AppDI } from "../../src/config/AppDI.ts";
import { type AppConfig, loadConfig } from "../../src/config/env.ts";
import { okResult, SAMPLE_TEXT, StaticSentimentProvider } from "../helpers/fakes.ts";

function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig({})._unsafeUnwrap(), ...overrides };
}

test("initializeAdapters - requires an API key without an injected provider", () => {
  const error = initializeAdapters(testConfig())._unsafeUnwrapErr();

  assert.deepEqual(error, {
    type: "no_provider",
    message: "Environment variable GOOGLE_API_KEY is not set",
  });
});

test("initializeAdapters - builds the Google client from the API key", () => {
  const adapters = initializeAdapters(testConfig({ googleApiKey: "test-secret" }))._unsafeUnwrap();

  assert.equal(adapters.provider.name, "google-language");
  assert.equal(adapters.cache.stats().maxBytes, 64 * 1024 * 1024);
});

test("initializeAdapters - rejects an invalid cache configuration", () => {
  const error = initializeAdapters(
    testConfig({ cacheEntryTtlMs: 0 }),
    new StaticSentimentProvider(okResult()),
  )._unsafeUnwrapErr();

  assert.equal(error.type, "cache");
});

test("AppDI - services require initialization", () => {
  const di = new AppDI();

  assert.equal(di.getApp()._unsafeUnwrapErr().type, "not_initialized");
  assert.equal(di.getSentimentService()._unsafeUnwrapErr().type, "not_initialized");
});

test("AppDI - initializes only once", () => {
  const adapters = initializeAdapters(testConfig(), new StaticSentimentProvider(okResult()))
    ._unsafeUnwrap();
  const di = new AppDI();

  assert.equal(di.initialize(adapters, { requestTimeoutMs: 1000 }).isOk(), true);
  assert.equal(
    di.initialize(adapters, { requestTimeoutMs: 1000 })._unsafeUnwrapErr().type,
    "already_initialized",
  );
});

test("AppDI - wires the HTTP app to the shared cache and provider", async () => {
  const provider = new StaticSentimentProvider(okResult());
  const adapters = initializeAdapters(testConfig(), provider)._unsafeUnwrap();
  const di = new AppDI();
  const app = di.initialize(adapters, { requestTimeoutMs: 1000 })
    .andThen((container) => container.getApp())
    ._unsafeUnwrap();

  for (let i = 0; i < 2; i++) {
    const response = await app.request("/api?limit=1", {
      method: "POST",
      body: JSON.stringify({ content: SAMPLE_TEXT }),
    });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), [{ word4: -0.8 }]);
  }

  assert.equal(provider.calls.length, 1);
  assert.equal(adapters.cache.stats().entries, 1);
  assert.equal(di.getSentimentService()._unsafeUnwrap(), di.getSentimentService()._unsafeUnwrap());
});

test("AppDI - shutdown closes the provider", () => {
  const provider = new StaticSentimentProvider(okResult());
  const adapters = initializeAdapters(testConfig(), provider)._unsafeUnwrap();
  const di = new AppDI();
  di.initialize(adapters, { requestTimeoutMs: 1000 });

  di.shutdown();

  assert.equal(provider.closed, true);
});
