import { describeError } from "../errors";
import type { ClientLookupResult, DomainLookupResult, LookupSettings } from "../types";

import { normalizeDomain } from "./domainParser";
import { createLogger, type Logger } from "./logger";
import { RdapBootstrap, type FetchLike } from "./rdapBootstrap";
import { RdapClient } from "./rdapQuery";
import { WhoisClient } from "./whoisQuery";

/**
 * 协议客户端的最小接口：成功返回结论，失败抛出异常。
 */
export interface LookupClient {
  query(domain: string): Promise<ClientLookupResult>;
}

/**
 * 单域名查询入口，批量调度器只依赖此接口。
 */
export interface DomainCheck {
  check(domain: string): Promise<DomainLookupResult>;
}

export interface DomainCheckerOptions {
  rdap: LookupClient;
  whois: LookupClient;
  logger?: Logger;
}

/**
 * 按 RDAP → WHOIS 顺序查询域名注册状态。
 */
export class DomainChecker implements DomainCheck {
  private readonly rdap: LookupClient;
  private readonly whois: LookupClient;
  private readonly logger: Logger;

  constructor(options: DomainCheckerOptions) {
    this.rdap = options.rdap;
    this.whois = options.whois;
    this.logger = options.logger ?? createLogger("checker");
  }

  /**
   * 按运行配置构造默认的 RDAP / WHOIS 客户端。
   */
  static create(
    settings: Pick<LookupSettings, "timeoutSeconds"> & Partial<Pick<LookupSettings, "bootstrapUrl">>,
    deps: { fetch?: FetchLike; bootstrap?: RdapBootstrap } = {}
  ): DomainChecker {
    const timeoutMs = settings.timeoutSeconds * 1000;
    const bootstrap =
      deps.bootstrap ?? new RdapBootstrap({ url: settings.bootstrapUrl, timeoutMs, fetch: deps.fetch });

    return new DomainChecker({
      rdap: new RdapClient({ timeoutMs, bootstrap, fetch: deps.fetch }),
      whois: new WhoisClient({ timeoutMs })
    });
  }

  /**
   * 查询单个域名，任何失败都收敛为 unknown 结果，不会抛出。
   */
  async check(rawDomain: string): Promise<DomainLookupResult> {
    const domain = normalizeDomain(rawDomain);

    try {
      const result = await this.rdap.query(domain);
      return { ...result, source: "rdap" };
    } catch (rdapError) {
      this.logger.debug("RDAP lookup failed, falling back to WHOIS", {
        domain,
        reason: describeError(rdapError)
      });
    }

    try {
      const result = await this.whois.query(domain);
      return { ...result, source: "whois" };
    } catch (whoisError) {
      // 以 WHOIS 的失败原因作为最终诊断
      const error = describeError(whoisError);
      this.logger.warn("Domain lookup failed", { domain, reason: error });
      return { domain, status: "unknown", error };
    }
  }
}
