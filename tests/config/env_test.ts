import assert from "node:assert/strict";
import { test } from "node:test";
import { loadConfig, parseDuration, parseListenAddress } from "../../src/config/env.ts";

test("loadConfig - defaults", () => {
  assert.deepEqual(loadConfig({})._unsafeUnwrap(), {
    host: "0.0.0.0",
    port: 8080,
    requestTimeoutMs: 1000,
    cacheMaxSizeMb: 64,
    cacheEntryTtlMs: 600_000,
    logLevel: "info",
    googleApiKey: "",
  });
});

test("loadConfig - reads environment variables", () => {
  const config = loadConfig({
    HOST: "127.0.0.1",
    PORT: "9000",
    REQUEST_TIMEOUT: "250ms",
    CACHE_MAX_SIZE_MB: "0",
    CACHE_ENTRY_TTL: "1h30m",
    LOG_LEVEL: "WARNING",
    GOOGLE_API_KEY: "test-secret",
  })._unsafeUnwrap();

  assert.deepEqual(config, {
    host: "127.0.0.1",
    port: 9000,
    requestTimeoutMs: 250,
    cacheMaxSizeMb: 0,
    cacheEntryTtlMs: 5_400_000,
    logLevel: "warn",
    googleApiKey: "test-secret",
  });
});

test("loadConfig - empty variables fall back to defaults", () => {
  const config = loadConfig({ PORT: "", REQUEST_TIMEOUT: "", LOG_LEVEL: "" })._unsafeUnwrap();

  assert.equal(config.port, 8080);
  assert.equal(config.requestTimeoutMs, 1000);
  assert.equal(config.logLevel, "info");
});

test("loadConfig - command-line values win over the environment", () => {
  const config = loadConfig(
    { HOST: "127.0.0.1", PORT: "9000", REQUEST_TIMEOUT: "5s", CACHE_ENTRY_TTL: "1m" },
    { listen: ":9999", timeout: "2s", cacheEntryTtl: "30s", cacheMaxSizeMb: "16", logLevel: "debug" },
  )._unsafeUnwrap();

  assert.equal(config.host, "127.0.0.1");
  assert.equal(config.port, 9999);
  assert.equal(config.requestTimeoutMs, 2000);
  assert.equal(config.cacheEntryTtlMs, 30_000);
  assert.equal(config.cacheMaxSizeMb, 16);
  assert.equal(config.logLevel, "debug");
});

test("loadConfig - listen address with a host", () => {
  const config = loadConfig({}, { listen: "localhost:7000" })._unsafeUnwrap();

  assert.equal(config.host, "localhost");
  assert.equal(config.port, 7000);
});

test("loadConfig - reports every invalid value", () => {
  const error = loadConfig({
    REQUEST_TIMEOUT: "fast",
    CACHE_MAX_SIZE_MB: "-1",
    LOG_LEVEL: "loud",
  })._unsafeUnwrapErr();

  assert.equal(error.type, "config");
  assert.deepEqual(error.issues, [
    'REQUEST_TIMEOUT: invalid duration "fast"',
    "CACHE_MAX_SIZE_MB: Number must be greater than or equal to 0",
    'LOG_LEVEL: unknown log level "loud"',
  ]);
});

test("loadConfig - durations must be positive", () => {
  const error = loadConfig({ CACHE_ENTRY_TTL: "0" })._unsafeUnwrapErr();

  assert.deepEqual(error.issues, ["CACHE_ENTRY_TTL: duration must be positive"]);
});

test("loadConfig - invalid listen address", () => {
  const error = loadConfig({}, { listen: "nocolon" })._unsafeUnwrapErr();

  assert.deepEqual(error.issues, ['invalid listen address "nocolon", expected host:port']);
});

test("parseDuration", () => {
  assert.equal(parseDuration("300ms")._unsafeUnwrap(), 300);
  assert.equal(parseDuration("1.5s")._unsafeUnwrap(), 1500);
  assert.equal(parseDuration("10m")._unsafeUnwrap(), 600_000);
  assert.equal(parseDuration("1h30m")._unsafeUnwrap(), 5_400_000);
  assert.equal(parseDuration("0")._unsafeUnwrap(), 0);

  assert.equal(parseDuration("10").isErr(), true);
  assert.equal(parseDuration("").isErr(), true);
  assert.equal(parseDuration("2d").isErr(), true);
  assert.equal(parseDuration("-1s").isErr(), true);
});

test("parseListenAddress", () => {
  assert.deepEqual(parseListenAddress(":8080")._unsafeUnwrap(), { host: undefined, port: "8080" });
  assert.deepEqual(parseListenAddress("0.0.0.0:80")._unsafeUnwrap(), { host: "0.0.0.0", port: "80" });
  assert.deepEqual(parseListenAddress("[::1]:8080")._unsafeUnwrap(), { host: "::1", port: "8080" });
  assert.equal(parseListenAddress("8080").isErr(), true);
});
