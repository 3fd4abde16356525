import i18n from "../i18n/i18n";

/**
 * 查询失败的 i18n 详情 key，同时作为错误分类。
 */
export type LookupErrorKey =
  | "lookup.detail.invalid-domain"
  | "rdap.detail.bootstrap-fetch"
  | "rdap.detail.bootstrap-parse"
  | "rdap.detail.bootstrap-missing"
  | "rdap.detail.all-failed"
  | "whois.detail.no-server"
  | "whois.detail.connect"
  | "whois.detail.read"
  | "whois.detail.timeout"
  | "whois.detail.unclassified";

export type LookupErrorParams = Record<string, string | number>;

/**
 * RDAP / WHOIS 客户端抛出的统一错误，message 为当前语言下的详情文案。
 */
export class LookupError extends Error {
  readonly detailKey: LookupErrorKey;
  readonly detailParams: LookupErrorParams;

  constructor(detailKey: LookupErrorKey, detailParams: LookupErrorParams = {}, options?: { cause?: unknown }) {
    super(i18n.t(detailKey, detailParams), options);
    this.name = "LookupError";
    this.detailKey = detailKey;
    this.detailParams = detailParams;
  }
}

/**
 * 提取任意异常的可读描述。
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
