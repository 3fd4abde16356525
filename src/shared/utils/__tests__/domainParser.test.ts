import { describe, expect, it } from "vitest";

import { normalizeDomain, tldCandidates } from "../domainParser";

describe("normalizeDomain", () => {
  it("trims whitespace and lowercases", () => {
    expect(normalizeDomain("  Example.COM\t")).toBe("example.com");
  });
});

describe("tldCandidates", () => {
  it("returns only the top-level label for two-label domains", () => {
    expect(tldCandidates("example.com")).toEqual(["com"]);
  });

  it("tries the compound label before the top-level label", () => {
    expect(tldCandidates("example.co.uk")).toEqual(["co.uk", "uk"]);
    expect(tldCandidates("www.example.co.uk")).toEqual(["co.uk", "uk"]);
  });

  it("rejects names with fewer than two labels", () => {
    expect(() => tldCandidates("localhost")).toThrow("Invalid domain: localhost");
  });
});
