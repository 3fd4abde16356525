import { LookupError } from "../errors";

/**
 * 查询前的域名归一化：去除首尾空白并转为小写。
 */
export function normalizeDomain(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * 按优先级列出用于匹配服务器的 TLD key：
 * 三段及以上的域名先尝试二级 TLD（如 co.uk），再尝试顶级 TLD。
 * @throws LookupError 域名少于两段时
 */
export function tldCandidates(domain: string): string[] {
  const labels = domain.split(".");
  if (labels.length < 2) {
    throw new LookupError("lookup.detail.invalid-domain", { domain });
  }

  const tld = labels[labels.length - 1];
  if (labels.length >= 3) {
    return [labels.slice(-2).join("."), tld];
  }
  return [tld];
}
