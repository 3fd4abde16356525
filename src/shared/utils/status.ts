import i18n from "../../i18n/i18n";
import type { DomainLookupRecord, DomainLookupResult, LookupStatus } from "../types";

const DOMAIN_COLUMN_WIDTH = 40;

interface StatusMeta {
  symbol: string;
  labelKey: string;
}

/**
 * 将查询状态映射为终端展示用的符号与文案 key。
 */
export function statusToMeta(status: LookupStatus): StatusMeta {
  switch (status) {
    case "available":
      return { symbol: "✓", labelKey: "lookup.status.available" };
    case "registered":
      return { symbol: "✗", labelKey: "lookup.status.registered" };
    case "unknown":
    default:
      return { symbol: "?", labelKey: "lookup.status.unknown" };
  }
}

/**
 * 生成单行可读结果；verbose 时附带注册商、到期日（UTC 日期）与来源。
 */
export function formatResultLine(result: DomainLookupResult, verbose = false): string {
  const { symbol, labelKey } = statusToMeta(result.status);
  const head = `${result.domain.padEnd(DOMAIN_COLUMN_WIDTH)} ${symbol} ${i18n.t(labelKey)}`;

  if (result.status === "unknown") {
    return `${head}: ${result.error}`;
  }

  if (result.status === "available" || !verbose) {
    return head;
  }

  const extras: string[] = [];
  if (result.registrar) {
    extras.push(i18n.t("output.registrar", { registrar: result.registrar }));
  }
  if (result.expiry) {
    extras.push(i18n.t("output.expiry", { date: result.expiry.toISOString().slice(0, 10) }));
  }
  extras.push(`[${result.source}]`);

  return `${head}  ${extras.join("  ")}`;
}

/**
 * 转换为可 JSON 序列化的记录，缺失字段直接省略。
 */
export function toResultRecord(result: DomainLookupResult): DomainLookupRecord {
  if (result.status === "unknown") {
    return { domain: result.domain, status: result.status, error: result.error };
  }

  const record: DomainLookupRecord = { domain: result.domain, status: result.status };
  if (result.registrar) {
    record.registrar = result.registrar;
  }
  if (result.expiry) {
    record.expiry = result.expiry.toISOString();
  }
  record.source = result.source;
  return record;
}
