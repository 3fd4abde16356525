import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { DEFAULT_SETTINGS, resolveSettings } from "../settings";

describe("resolveSettings", () => {
  it("falls back to defaults", () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS).toEqual({
      concurrency: 5,
      timeoutSeconds: 10,
      bootstrapUrl: "https://data.iana.org/rdap/dns.json"
    });
  });

  it("reads environment variables", () => {
    expect(
      resolveSettings({
        DOMAIN_LOOKUP_CONCURRENCY: "8",
        DOMAIN_LOOKUP_TIMEOUT: "2.5",
        DOMAIN_LOOKUP_BOOTSTRAP_URL: "https://bootstrap.test/dns.json"
      })
    ).toEqual({ concurrency: 8, timeoutSeconds: 2.5, bootstrapUrl: "https://bootstrap.test/dns.json" });
  });

  it("lets explicit overrides win over the environment", () => {
    expect(resolveSettings({ DOMAIN_LOOKUP_CONCURRENCY: "8" }, { concurrency: "3" }).concurrency).toBe(3);
  });

  it("rejects invalid values", () => {
    expect(() => resolveSettings({}, { concurrency: "0" })).toThrow(ZodError);
    expect(() => resolveSettings({}, { timeoutSeconds: "soon" })).toThrow(ZodError);
    expect(() => resolveSettings({ DOMAIN_LOOKUP_BOOTSTRAP_URL: "not a url" })).toThrow(ZodError);
  });
});
