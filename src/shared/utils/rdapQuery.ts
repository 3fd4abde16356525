import { describeError, LookupError } from "../errors";
import {
  RdapDomainSchema,
  RdapEntitySchema,
  RdapEventSchema,
  VCardArraySchema,
  VCardTextPropertySchema
} from "../schemas";
import type { ClientLookupResult } from "../types";

import { parseRfc3339 } from "./dates";
import { createLogger, type Logger } from "./logger";
import { RdapBootstrap, type FetchLike } from "./rdapBootstrap";

const DEFAULT_TIMEOUT_MS = 10_000;

export interface RdapClientOptions {
  /** 单次请求超时（毫秒） */
  timeoutMs?: number;
  /** 共享的 Bootstrap 缓存，缺省时自建一个 */
  bootstrap?: RdapBootstrap;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * 单个端点的查询结果：decisive 表示已得出结论，否则附带失败原因。
 */
type EndpointOutcome =
  | { decisive: true; result: ClientLookupResult }
  | { decisive: false; reason: string };

/**
 * 基于 IANA Bootstrap 的 RDAP 客户端，按顺序尝试 TLD 的各个端点。
 */
export class RdapClient {
  private readonly timeoutMs: number;
  private readonly bootstrap: RdapBootstrap;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: RdapClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger("rdap");
    this.bootstrap =
      options.bootstrap ??
      new RdapBootstrap({ timeoutMs: this.timeoutMs, fetch: this.fetchImpl, logger: this.logger });
  }

  /**
   * 查询域名注册状态。
   * @param domain 已归一化的 ASCII 域名
   * @throws LookupError 无可用端点或所有端点均失败
   */
  async query(domain: string): Promise<ClientLookupResult> {
    const endpoints = await this.bootstrap.endpointsFor(domain);
    let lastReason = "no endpoints";

    for (const endpoint of endpoints) {
      // 单个端点失败只切换到下一个，不向调用方抛出
      const outcome = await this.queryEndpoint(buildDomainQueryUrl(endpoint, domain), domain);
      if (outcome.decisive) {
        return outcome.result;
      }
      lastReason = outcome.reason;
      this.logger.debug("RDAP endpoint failed", { domain, endpoint, reason: outcome.reason });
    }

    throw new LookupError("rdap.detail.all-failed", { domain, reason: lastReason });
  }

  private async queryEndpoint(url: string, domain: string): Promise<EndpointOutcome> {
    try {
      const response = await this.fetchImpl(url, {
        headers: { Accept: "application/rdap+json, application/json" },
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (response.status === 404) {
        await response.body?.cancel();
        return { decisive: true, result: { domain, status: "available" } };
      }

      if (response.status !== 200) {
        await response.body?.cancel();
        return { decisive: false, reason: `HTTP ${response.status}` };
      }

      const body: unknown = await response.json();
      const parsed = RdapDomainSchema.safeParse(body);
      if (!parsed.success) {
        return { decisive: false, reason: "unexpected RDAP response" };
      }

      return {
        decisive: true,
        result: {
          domain,
          status: "registered",
          registrar: extractRegistrar(parsed.data.entities ?? []),
          expiry: extractExpiry(parsed.data.events ?? [])
        }
      };
    } catch (error) {
      return { decisive: false, reason: describeError(error) };
    }
  }
}

/**
 * 构造指定 RDAP 服务的 domain 查询 URL。
 */
export function buildDomainQueryUrl(serviceUrl: string, domain: string): string {
  const normalized = serviceUrl.endsWith("/") ? serviceUrl : `${serviceUrl}/`;
  return `${normalized}domain/${encodeURIComponent(domain)}`;
}

/**
 * 取最后一个 eventAction 为 expiration 且日期可解析的事件。
 */
export function extractExpiry(events: unknown[]): Date | undefined {
  let expiry: Date | undefined;
  for (const raw of events) {
    const event = RdapEventSchema.safeParse(raw);
    if (!event.success || event.data.eventAction !== "expiration") {
      continue;
    }
    expiry = parseRfc3339(event.data.eventDate) ?? expiry;
  }
  return expiry;
}

/**
 * 从第一个带 registrar 角色的实体中读取 vCard 的 fn 字段。
 */
export function extractRegistrar(entities: unknown[]): string | undefined {
  for (const raw of entities) {
    const entity = RdapEntitySchema.safeParse(raw);
    if (entity.success && entity.data.roles.includes("registrar")) {
      return extractVCardFn(entity.data.vcardArray);
    }
  }
  return undefined;
}

/**
 * vcardArray 形如 ["vcard", [[prop, params, type, value], ...]]，结构不符时返回 undefined。
 */
export function extractVCardFn(vcardArray: unknown): string | undefined {
  const card = VCardArraySchema.safeParse(vcardArray);
  if (!card.success) {
    return undefined;
  }

  for (const rawProperty of card.data[1]) {
    const property = VCardTextPropertySchema.safeParse(rawProperty);
    if (property.success && property.data[0] === "fn") {
      return property.data[3];
    }
  }
  return undefined;
}
