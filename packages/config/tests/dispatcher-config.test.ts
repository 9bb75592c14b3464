import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  readDispatcherConfig,
  readTrailingSlashMatch,
  DEFAULT_DISPATCHER_CONFIG,
} from "../src/dispatcher-config";

const KEYS = [
  "SWITCHYARD_FLASH_TTL_SECONDS",
  "SWITCHYARD_ASYNC_TIMEOUT_MS",
  "SWITCHYARD_THROW_IF_NO_HANDLER_FOUND",
  "SWITCHYARD_TRAILING_SLASH_MATCH",
  "SWITCHYARD_PUBLISH_EVENTS",
  "SWITCHYARD_DEFAULT_LOCALE",
];

describe("readDispatcherConfig", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const key of KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("should return defaults when no env vars are set", () => {
    expect(readDispatcherConfig()).toEqual({
      flashTimeToLiveSeconds: 180,
      asyncTimeoutMs: 30_000,
      throwIfNoHandlerFound: false,
      publishEvents: true,
      defaultLocale: "en",
    });
  });

  it("should read every setting from the environment", () => {
    process.env.SWITCHYARD_FLASH_TTL_SECONDS = "5";
    process.env.SWITCHYARD_ASYNC_TIMEOUT_MS = "250";
    process.env.SWITCHYARD_THROW_IF_NO_HANDLER_FOUND = "true";
    process.env.SWITCHYARD_PUBLISH_EVENTS = "false";
    process.env.SWITCHYARD_DEFAULT_LOCALE = "fr-CA";

    expect(readDispatcherConfig()).toEqual({
      flashTimeToLiveSeconds: 5,
      asyncTimeoutMs: 250,
      throwIfNoHandlerFound: true,
      publishEvents: false,
      defaultLocale: "fr-CA",
    });
  });

  it("should reject a zero async timeout", () => {
    process.env.SWITCHYARD_ASYNC_TIMEOUT_MS = "0";
    expect(readDispatcherConfig().asyncTimeoutMs).toBe(DEFAULT_DISPATCHER_CONFIG.asyncTimeoutMs);
  });

  it("should let explicit overrides win over the environment", () => {
    process.env.SWITCHYARD_FLASH_TTL_SECONDS = "5";
    expect(readDispatcherConfig({ flashTimeToLiveSeconds: 1 }).flashTimeToLiveSeconds).toBe(1);
  });
});

describe("readTrailingSlashMatch", () => {
  const original = process.env.SWITCHYARD_TRAILING_SLASH_MATCH;

  afterEach(() => {
    if (original === undefined) delete process.env.SWITCHYARD_TRAILING_SLASH_MATCH;
    else process.env.SWITCHYARD_TRAILING_SLASH_MATCH = original;
  });

  it("should default to lenient matching", () => {
    delete process.env.SWITCHYARD_TRAILING_SLASH_MATCH;
    expect(readTrailingSlashMatch()).toBe(true);
  });

  it("should read strict matching from the environment", () => {
    process.env.SWITCHYARD_TRAILING_SLASH_MATCH = "false";
    expect(readTrailingSlashMatch()).toBe(false);
  });

  it("should not be part of the dispatcher config", () => {
    process.env.SWITCHYARD_TRAILING_SLASH_MATCH = "false";
    expect(Object.keys(readDispatcherConfig())).not.toContain("trailingSlashMatch");
  });
});
