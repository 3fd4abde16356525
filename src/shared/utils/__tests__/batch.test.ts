import { setTimeout as delay } from "node:timers/promises";

import { describe, expect, it, vi } from "vitest";

import type { DomainLookupResult } from "../../types";
import { queryBatch } from "../batch";
import type { DomainCheck } from "../checkPipeline";
import { createConcurrentQueue } from "../concurrentQueue";
import { RdapBootstrap, type FetchLike } from "../rdapBootstrap";

const BOOTSTRAP_URL = "https://bootstrap.test/dns.json";

function availableResult(domain: string): DomainLookupResult {
  return { domain, status: "available", source: "rdap" };
}

/**
 * 记录同时在途的查询数，超过上限即判定失败。
 */
function createInstrumentedChecker(limit: number) {
  let inFlight = 0;
  let maxInFlight = 0;

  const checker: DomainCheck = {
    check: async (domain) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      if (inFlight > limit) {
        throw new Error(`concurrency ceiling exceeded: ${inFlight}`);
      }
      await delay(5);
      inFlight -= 1;
      return availableResult(domain);
    }
  };

  return {
    checker,
    get maxInFlight() {
      return maxInFlight;
    }
  };
}

describe("queryBatch", () => {
  it("returns results in input order regardless of completion order", async () => {
    const domains = ["a.com", "b.com", "c.com", "d.com"];
    const checker: DomainCheck = {
      check: async (domain) => {
        // 越靠前的域名完成得越晚
        await delay((domains.length - domains.indexOf(domain)) * 5);
        return availableResult(domain);
      }
    };

    const results = await queryBatch(domains, 4, 1, { checker });

    expect(results.map((result) => result.domain)).toEqual(domains);
  });

  it("never runs more than the configured number of lookups at once", async () => {
    const instrumented = createInstrumentedChecker(2);
    const domains = Array.from({ length: 9 }, (_, index) => `site${index}.com`);

    const results = await queryBatch(domains, 2, 1, { checker: instrumented.checker });

    expect(results).toHaveLength(9);
    expect(instrumented.maxInFlight).toBe(2);
  });

  it("treats a concurrency below one as one", async () => {
    const instrumented = createInstrumentedChecker(1);

    await queryBatch(["a.com", "b.com", "c.com"], 0, 1, { checker: instrumented.checker });

    expect(instrumented.maxInFlight).toBe(1);
  });

  it("treats a non-numeric concurrency as one", async () => {
    const instrumented = createInstrumentedChecker(1);

    const results = await queryBatch(["a.com", "b.com", "c.com"], Number.NaN, 1, {
      checker: instrumented.checker
    });

    expect(results.map((result) => result.domain)).toEqual(["a.com", "b.com", "c.com"]);
    expect(instrumented.maxInFlight).toBe(1);
  });

  it("returns an empty list for an empty batch", async () => {
    await expect(queryBatch([], 3, 1, { checker: { check: vi.fn() } })).resolves.toEqual([]);
  });

  it("keeps one slot per input even for duplicate domains", async () => {
    const checker: DomainCheck = { check: async (domain) => availableResult(domain.trim().toLowerCase()) };

    const results = await queryBatch(["Example.com", "example.com "], 2, 1, { checker });

    expect(results).toEqual([availableResult("example.com"), availableResult("example.com")]);
  });

  it("loads the RDAP bootstrap once for the whole batch", async () => {
    const fetchMock = vi.fn<FetchLike>(async (url) => {
      if (url === BOOTSTRAP_URL) {
        await delay(5);
        return new Response(JSON.stringify({ services: [[["com"], ["https://rdap.test/"]]] }), { status: 200 });
      }
      return new Response(null, { status: 404 });
    });

    const results = await queryBatch(["a.com", "B.com", "c.com"], 3, 1, {
      fetch: fetchMock,
      bootstrapUrl: BOOTSTRAP_URL
    });

    expect(results).toEqual([availableResult("a.com"), availableResult("b.com"), availableResult("c.com")]);
    expect(fetchMock.mock.calls.filter(([url]) => url === BOOTSTRAP_URL)).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it("reuses the loaded bootstrap across batches", async () => {
    const bootstrapUrl = "https://bootstrap.test/reused.json";
    const fetchMock = vi.fn<FetchLike>(async (url) => {
      if (url === bootstrapUrl) {
        return new Response(JSON.stringify({ services: [[["com"], ["https://rdap.test/"]]] }), { status: 200 });
      }
      return new Response(null, { status: 404 });
    });

    await queryBatch(["a.com"], 1, 1, { fetch: fetchMock, bootstrapUrl });
    await queryBatch(["b.com"], 1, 1, { fetch: fetchMock, bootstrapUrl });

    expect(fetchMock.mock.calls.filter(([url]) => url === bootstrapUrl)).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("uses an injected bootstrap instead of fetching one", async () => {
    const bootstrap = RdapBootstrap.fromServices([[["com"], ["https://rdap.test/"]]]);
    const fetchMock = vi.fn<FetchLike>(async () => new Response(null, { status: 404 }));

    const results = await queryBatch(["a.com"], 1, 1, { fetch: fetchMock, bootstrap });

    expect(results).toEqual([availableResult("a.com")]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith("https://rdap.test/domain/a.com", expect.anything());
  });
});

describe("createConcurrentQueue", () => {
  it("queues tasks beyond the limit and drains them as slots free up", async () => {
    const queue = createConcurrentQueue(1);
    const order: string[] = [];

    const first = queue.enqueue(async () => {
      await delay(5);
      order.push("first");
      return 1;
    });
    const second = queue.enqueue(async () => {
      order.push("second");
      return 2;
    });

    expect(queue.activeCount).toBe(1);
    expect(queue.pendingCount).toBe(1);
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(["first", "second"]);
    expect(queue.activeCount).toBe(0);
  });

  it("releases the slot when a task rejects", async () => {
    const queue = createConcurrentQueue(1);

    const failing = queue.enqueue(async () => {
      throw new Error("boom");
    });
    const next = queue.enqueue(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
