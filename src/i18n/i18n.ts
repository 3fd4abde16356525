import i18n from "i18next";

import zhCommon from "../locales/zh-Hans/common.json";
import enCommon from "../locales/en-US/common.json";

const SUPPORTED_LANGUAGES = ["zh-Hans", "en-US"] as const;
type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

const LANGUAGE_ALIASES: Record<string, SupportedLanguage> = {
  "zh-hans": "zh-Hans",
  "zh-cn": "zh-Hans",
  zh: "zh-Hans",
  "en-us": "en-US",
  en: "en-US"
};

function isSupportedLanguage(value: string): value is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((lang) => lang === value);
}

/**
 * 根据环境变量推断界面语言，若无法匹配则回退至英文。
 * 优先级：DOMAIN_LOOKUP_LANG > LC_ALL > LANG。
 */
export function resolveDefaultLanguage(env: NodeJS.ProcessEnv = process.env): SupportedLanguage {
  const candidates = [env.DOMAIN_LOOKUP_LANG, env.LC_ALL, env.LANG]
    .filter((lang): lang is string => Boolean(lang))
    // POSIX locale 形如 zh_CN.UTF-8，去掉编码部分并统一分隔符
    .map((lang) => lang.split(".")[0].replace(/_/g, "-"));

  for (const candidate of candidates) {
    if (isSupportedLanguage(candidate)) {
      return candidate;
    }

    const lower = candidate.toLowerCase();
    const alias = LANGUAGE_ALIASES[lower];
    if (alias) {
      return alias;
    }

    const base = lower.split("-")[0];
    const baseAlias = LANGUAGE_ALIASES[base];
    if (baseAlias) {
      return baseAlias;
    }
  }

  return "en-US";
}

// 资源内联且关闭 initImmediate，init 在返回前已同步完成
void i18n.init({
  lng: resolveDefaultLanguage(),
  fallbackLng: "en-US",
  supportedLngs: [...SUPPORTED_LANGUAGES],
  resources: {
    "zh-Hans": { common: zhCommon },
    "en-US": { common: enCommon }
  },
  ns: ["common"],
  defaultNS: "common",
  initImmediate: false,
  interpolation: { escapeValue: false }
});

export default i18n;
