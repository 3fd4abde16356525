import type { DomainLookupResult } from "../types";

import { DomainChecker, type DomainCheck } from "./checkPipeline";
import { createConcurrentQueue } from "./concurrentQueue";
import { IANA_RDAP_BOOTSTRAP_ENDPOINT, RdapBootstrap, type FetchLike } from "./rdapBootstrap";

export interface QueryBatchDeps {
  /** 自定义单域名查询实现，缺省时按超时配置构造 DomainChecker */
  checker?: DomainCheck;
  /** 共享的 RDAP Bootstrap 缓存，缺省时使用按地址复用的进程级实例 */
  bootstrap?: RdapBootstrap;
  /** 覆盖 RDAP Bootstrap 地址 */
  bootstrapUrl?: string;
  fetch?: FetchLike;
}

// 进程级缓存：同一 fetch 实现与地址只保留一个 Bootstrap 实例
const sharedBootstraps = new WeakMap<FetchLike, Map<string, RdapBootstrap>>();

function sharedBootstrap(url: string, timeoutMs: number, fetchImpl: FetchLike): RdapBootstrap {
  let byUrl = sharedBootstraps.get(fetchImpl);
  if (!byUrl) {
    byUrl = new Map();
    sharedBootstraps.set(fetchImpl, byUrl);
  }

  let bootstrap = byUrl.get(url);
  if (!bootstrap) {
    bootstrap = new RdapBootstrap({ url, timeoutMs, fetch: fetchImpl });
    byUrl.set(url, bootstrap);
  }
  return bootstrap;
}

/**
 * 并发查询所有域名，结果与输入一一对应且保持输入顺序。
 * @param domains 待查询域名
 * @param concurrency 同时进行的查询上限
 * @param timeoutSeconds 单次网络操作超时（秒）
 */
export async function queryBatch(
  domains: readonly string[],
  concurrency: number,
  timeoutSeconds: number,
  deps: QueryBatchDeps = {}
): Promise<DomainLookupResult[]> {
  const checker = deps.checker ?? createDefaultChecker(timeoutSeconds, deps);
  const queue = createConcurrentQueue(concurrency);
  const results = new Array<DomainLookupResult>(domains.length);

  // 槽位在派发时按输入下标确定，与完成顺序无关
  await Promise.all(
    domains.map((domain, index) =>
      queue.enqueue(async () => {
        results[index] = await checker.check(domain);
      })
    )
  );

  return results;
}

function createDefaultChecker(timeoutSeconds: number, deps: QueryBatchDeps): DomainChecker {
  const fetchImpl = deps.fetch ?? fetch;
  const bootstrap =
    deps.bootstrap ??
    sharedBootstrap(deps.bootstrapUrl ?? IANA_RDAP_BOOTSTRAP_ENDPOINT, timeoutSeconds * 1000, fetchImpl);

  return DomainChecker.create({ timeoutSeconds }, { fetch: fetchImpl, bootstrap });
}
