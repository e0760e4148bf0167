// src/config/__tests__/env.test.ts

import { afterEach, describe, expect, it, vi } from "vitest";

import { assertHttpUrl, parseChoiceEnv, parsePositiveIntEnv } from "../env.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("parsePositiveIntEnv", () => {
  it("falls back when unset or empty", () => {
    vi.stubEnv("TEST_LIMIT", "");
    expect(parsePositiveIntEnv("TEST_LIMIT", 42)).toBe(42);
    expect(parsePositiveIntEnv("TEST_LIMIT_UNSET", 7)).toBe(7);
  });

  it("parses integers at or above the minimum", () => {
    vi.stubEnv("TEST_LIMIT", "0");
    expect(parsePositiveIntEnv("TEST_LIMIT", 5, 0)).toBe(0);
    expect(() => parsePositiveIntEnv("TEST_LIMIT", 5)).toThrow("TEST_LIMIT must be an integer >= 1");
  });

  it("rejects non-integers", () => {
    vi.stubEnv("TEST_LIMIT", "2.5");
    expect(() => parsePositiveIntEnv("TEST_LIMIT", 5)).toThrow("TEST_LIMIT must be an integer >= 1");
  });
});

describe("parseChoiceEnv", () => {
  const backends = ["redis", "memory"] as const;

  it("accepts a listed value", () => {
    vi.stubEnv("TEST_BACKEND", " memory ");
    expect(parseChoiceEnv("TEST_BACKEND", backends, "redis")).toBe("memory");
  });

  it("rejects anything else", () => {
    vi.stubEnv("TEST_BACKEND", "postgres");
    expect(() => parseChoiceEnv("TEST_BACKEND", backends, "redis")).toThrow(
      "TEST_BACKEND must be one of: redis, memory"
    );
  });
});

describe("assertHttpUrl", () => {
  it("only allows http and https", () => {
    expect(() => assertHttpUrl("URL", "https://publisher.test")).not.toThrow();
    expect(() => assertHttpUrl("URL", "ftp://publisher.test")).toThrow(
      "URL must start with http:// or https://"
    );
  });
});
