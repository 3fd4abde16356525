import net from "node:net";

import whoisServers from "../data/whoisServers.json";
import { describeError, LookupError } from "../errors";
import type { ClientLookupResult } from "../types";

import { parseWhoisDate } from "./dates";
import { tldCandidates } from "./domainParser";
import { createLogger, type Logger } from "./logger";

export const WHOIS_PORT = 43;

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * 常用 TLD（含 co.uk 这类二级 TLD）对应的 WHOIS 服务器。
 */
export const DEFAULT_WHOIS_SERVERS: Readonly<Record<string, string>> = whoisServers;

/**
 * 未注册特征（小写匹配）。先于已注册特征检查：
 * 部分注册局的 "not found" 文案里同样带有字段名。
 */
export const NOT_REGISTERED_MARKERS = [
  "no match for",
  "not found",
  "no entries found",
  "no data found",
  "object does not exist",
  "no objects found",
  "domain not found",
  "status: free",
  "available for registration",
  "this domain name has not been registered"
] as const;

/**
 * 已注册特征字段（小写匹配）。
 */
export const REGISTERED_MARKERS = [
  "domain name:",
  "registrar:",
  "creation date:",
  "registered on:",
  "domain status:",
  "registrant:",
  "registry domain id:",
  "nserver:"
] as const;

/**
 * 到期日字段名，按优先级排列。
 */
export const EXPIRY_FIELDS = ["Registry Expiry Date", "Expiry Date", "Expiration Date", "paid-till"] as const;

/**
 * WHOIS 文本解析结果；无法归类时 status 为 unknown。
 */
export type WhoisParseResult = ClientLookupResult | { domain: string; status: "unknown" };

export interface WhoisClientOptions {
  /** 连接与读取共用的超时（毫秒） */
  timeoutMs?: number;
  /** TLD → WHOIS 服务器映射 */
  servers?: Readonly<Record<string, string>>;
  port?: number;
  logger?: Logger;
}

/**
 * 通过 TCP 43 端口查询 WHOIS。
 */
export class WhoisClient {
  private readonly timeoutMs: number;
  private readonly servers: ReadonlyMap<string, string>;
  private readonly port: number;
  private readonly logger: Logger;

  constructor(options: WhoisClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.servers = new Map(Object.entries(options.servers ?? DEFAULT_WHOIS_SERVERS));
    this.port = options.port ?? WHOIS_PORT;
    this.logger = options.logger ?? createLogger("whois");
  }

  /**
   * 按 二级 TLD → 顶级 TLD 的顺序查找 WHOIS 服务器。
   * @throws LookupError 域名无效或 TLD 不在映射表中
   */
  resolveServer(domain: string): string {
    const candidates = tldCandidates(domain);
    for (const key of candidates) {
      const server = this.servers.get(key);
      if (server) {
        return server;
      }
    }
    throw new LookupError("whois.detail.no-server", { tld: candidates[candidates.length - 1] });
  }

  /**
   * 查询域名注册状态；响应无法归类时同样视为失败。
   * @param domain 已归一化的 ASCII 域名
   */
  async query(domain: string): Promise<ClientLookupResult> {
    const server = this.resolveServer(domain);
    const body = await this.fetchResponse(server, domain);
    this.logger.debug("WHOIS response received", { domain, server, bytes: body.length });

    const parsed = parseWhoisResponse(domain, body);
    if (parsed.status === "unknown") {
      throw new LookupError("whois.detail.unclassified", { domain });
    }
    return parsed;
  }

  private fetchResponse(server: string, domain: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let connected = false;

      const socket = net.createConnection({ host: server, port: this.port });

      // 超时同时覆盖建立连接与读完整个响应
      const timeoutHandle = setTimeout(() => {
        socket.destroy(new LookupError("whois.detail.timeout", { server, timeoutMs: this.timeoutMs }));
      }, this.timeoutMs);

      socket.once("connect", () => {
        connected = true;
        socket.write(`${domain}\r\n`);
      });

      socket.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });

      socket.once("error", (error) => {
        clearTimeout(timeoutHandle);
        if (error instanceof LookupError) {
          reject(error);
          return;
        }
        const detailKey = connected ? "whois.detail.read" : "whois.detail.connect";
        reject(new LookupError(detailKey, { server, reason: describeError(error) }, { cause: error }));
      });

      socket.once("close", (hadError) => {
        clearTimeout(timeoutHandle);
        if (!hadError) {
          resolve(Buffer.concat(chunks).toString("utf8"));
        }
      });
    });
  }
}

/**
 * 按特征字符串归类 WHOIS 响应，已注册时提取注册商与到期日。
 */
export function parseWhoisResponse(domain: string, body: string): WhoisParseResult {
  const lower = body.toLowerCase();

  if (NOT_REGISTERED_MARKERS.some((marker) => lower.includes(marker))) {
    return { domain, status: "available" };
  }

  if (!REGISTERED_MARKERS.some((marker) => lower.includes(marker))) {
    return { domain, status: "unknown" };
  }

  return {
    domain,
    status: "registered",
    registrar: whoisField(body, "Registrar"),
    expiry: extractWhoisExpiry(body)
  };
}

/**
 * 提取 WHOIS 响应中指定字段的值（字段名忽略大小写，取第一行匹配）。
 */
export function whoisField(body: string, field: string): string | undefined {
  const prefix = `${field.toLowerCase()}:`;
  for (const line of body.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.toLowerCase().startsWith(prefix)) {
      return trimmed.slice(prefix.length).trim() || undefined;
    }
  }
  return undefined;
}

function extractWhoisExpiry(body: string): Date | undefined {
  for (const field of EXPIRY_FIELDS) {
    const value = whoisField(body, field);
    const date = value ? parseWhoisDate(value) : undefined;
    if (date) {
      return date;
    }
  }
  return undefined;
}
