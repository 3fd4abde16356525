/**
 * 域名注册状态。
 */
export type LookupStatus = "registered" | "available" | "unknown";

/**
 * 得出结论的协议来源。
 */
export type LookupSource = "rdap" | "whois";

/**
 * 单个协议客户端给出的确定结论（尚未标注来源）。
 */
export interface ClientLookupResult {
  /** 归一化后的域名 */
  domain: string;
  /** 已注册或可注册 */
  status: Exclude<LookupStatus, "unknown">;
  /** 注册商名称 */
  registrar?: string;
  /** 到期时间 */
  expiry?: Date;
}

/**
 * 查询成功时的最终结果。
 */
export interface ResolvedLookupResult extends ClientLookupResult {
  source: LookupSource;
  error?: never;
}

/**
 * RDAP 与 WHOIS 均失败时的最终结果。
 */
export interface FailedLookupResult {
  domain: string;
  status: "unknown";
  /** 最终诊断信息 */
  error: string;
  source?: never;
  registrar?: never;
  expiry?: never;
}

/**
 * 单个域名的查询结果：status 为 unknown 时必有 error 且无 source。
 */
export type DomainLookupResult = ResolvedLookupResult | FailedLookupResult;

/**
 * 可序列化为 JSON 的结果记录。
 */
export interface DomainLookupRecord {
  domain: string;
  status: LookupStatus;
  registrar?: string;
  /** ISO-8601 时间字符串 */
  expiry?: string;
  source?: LookupSource;
  error?: string;
}

/**
 * IANA RDAP Bootstrap 中的单条服务：[TLD 列表, 端点列表]。
 */
export type RdapBootstrapService = [string[], string[]];

/**
 * 运行配置。
 */
export interface LookupSettings {
  /** 最大并发查询数 */
  concurrency: number;
  /** 单次网络操作超时（秒） */
  timeoutSeconds: number;
  /** RDAP Bootstrap 文件地址 */
  bootstrapUrl: string;
}
