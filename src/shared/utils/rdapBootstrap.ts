import { describeError, LookupError } from "../errors";
import { RdapBootstrapFileSchema } from "../schemas";
import type { RdapBootstrapService } from "../types";

import { tldCandidates } from "./domainParser";
import { createLogger, type Logger } from "./logger";

export const IANA_RDAP_BOOTSTRAP_ENDPOINT = "https://data.iana.org/rdap/dns.json";

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * 与全局 fetch 兼容的请求函数，便于测试注入。
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

type RdapServiceIndex = Map<string, string[]>;

export interface RdapBootstrapOptions {
  /** Bootstrap 文件地址 */
  url?: string;
  /** 拉取超时（毫秒） */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * RDAP Bootstrap 缓存：首次查询时拉取 IANA 引导文件并按 TLD 建立索引。
 *
 * 并发的首批调用方共享同一个加载中的 Promise，整个实例生命周期内最多成功拉取一次；
 * 拉取失败不会标记为已加载，后续调用会重新尝试。
 */
export class RdapBootstrap {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  private index: RdapServiceIndex | null = null;
  private loading: Promise<RdapServiceIndex> | null = null;

  constructor(options: RdapBootstrapOptions = {}) {
    this.url = options.url ?? IANA_RDAP_BOOTSTRAP_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger("rdap-bootstrap");
  }

  /**
   * 使用现成的服务列表构造已加载的实例，不会发起网络请求。
   */
  static fromServices(services: RdapBootstrapService[], options: RdapBootstrapOptions = {}): RdapBootstrap {
    const bootstrap = new RdapBootstrap(options);
    bootstrap.index = buildServiceIndex(services);
    return bootstrap;
  }

  isLoaded(): boolean {
    return this.index !== null;
  }

  /**
   * 返回域名对应的 RDAP 端点列表（按引导文件中的顺序）。
   * @throws LookupError 域名无效、引导文件拉取/解析失败或 TLD 无对应服务
   */
  async endpointsFor(domain: string): Promise<string[]> {
    const candidates = tldCandidates(domain);
    const index = await this.load();

    for (const key of candidates) {
      const endpoints = index.get(key);
      if (endpoints) {
        return [...endpoints];
      }
    }

    throw new LookupError("rdap.detail.bootstrap-missing", {
      tld: candidates[candidates.length - 1]
    });
  }

  private load(): Promise<RdapServiceIndex> {
    if (this.index) {
      return Promise.resolve(this.index);
    }

    if (!this.loading) {
      this.loading = this.fetchIndex()
        .then((index) => {
          this.index = index;
          this.logger.info("RDAP bootstrap loaded", { url: this.url, tlds: index.size });
          return index;
        })
        .catch((error: unknown) => {
          // 失败后清空，允许下一次查询重新拉取
          this.loading = null;
          throw error;
        });
    }

    return this.loading;
  }

  private async fetchIndex(): Promise<RdapServiceIndex> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new LookupError("rdap.detail.bootstrap-fetch", { reason: describeError(error) }, { cause: error });
    }

    if (!response.ok) {
      throw new LookupError("rdap.detail.bootstrap-fetch", { reason: `HTTP ${response.status}` });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new LookupError("rdap.detail.bootstrap-parse", { reason: describeError(error) }, { cause: error });
    }

    const parsed = RdapBootstrapFileSchema.safeParse(body);
    if (!parsed.success) {
      throw new LookupError("rdap.detail.bootstrap-parse", {
        reason: parsed.error.issues[0]?.message ?? "invalid document"
      });
    }

    return buildServiceIndex(parsed.data.services);
  }
}

/**
 * 将 services 展开为 TLD（小写）→ 端点列表的索引。
 */
function buildServiceIndex(services: string[][][]): RdapServiceIndex {
  const index: RdapServiceIndex = new Map();

  for (const service of services) {
    if (service.length < 2) {
      continue;
    }
    const [tlds, urls] = service;
    for (const rawTld of tlds) {
      index.set(rawTld.toLowerCase(), urls);
    }
  }

  return index;
}
