import { isValid, parse, parseISO } from "date-fns";

const RFC3339_REGEX = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * WHOIS 中常见的不含时区的日期格式，按优先级排列；解析结果按 UTC 解释。
 */
const WHOIS_DATE_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ss'Z'",
  "yyyy-MM-dd",
  "dd-MMM-yyyy",
  "yyyy.MM.dd",
  "dd/MM/yyyy"
] as const;

/**
 * 解析 RFC 3339 时间戳，格式不符时返回 undefined。
 */
export function parseRfc3339(value: string): Date | undefined {
  const trimmed = value.trim();
  if (!RFC3339_REGEX.test(trimmed)) {
    return undefined;
  }
  const date = parseISO(trimmed);
  return isValid(date) ? date : undefined;
}

/**
 * 依次尝试 RFC 3339 与 WHOIS 常见日期格式，取第一个解析成功的结果。
 */
export function parseWhoisDate(value: string): Date | undefined {
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }

  const rfc3339 = parseRfc3339(trimmed);
  if (rfc3339) {
    return rfc3339;
  }

  for (const pattern of WHOIS_DATE_FORMATS) {
    const local = parse(trimmed, pattern, new Date(0));
    if (isValid(local)) {
      return asUtc(local);
    }
  }

  return undefined;
}

/**
 * date-fns 按本地时区构造结果，这里把各字段原样搬到 UTC。
 */
function asUtc(local: Date): Date {
  return new Date(
    Date.UTC(
      local.getFullYear(),
      local.getMonth(),
      local.getDate(),
      local.getHours(),
      local.getMinutes(),
      local.getSeconds()
    )
  );
}
