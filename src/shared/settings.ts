import { LookupSettingsSchema } from "./schemas";
import type { LookupSettings } from "./types";
import { IANA_RDAP_BOOTSTRAP_ENDPOINT } from "./utils/rdapBootstrap";

/**
 * 默认运行配置。
 */
export const DEFAULT_SETTINGS: LookupSettings = {
  concurrency: 5,
  timeoutSeconds: 10,
  bootstrapUrl: IANA_RDAP_BOOTSTRAP_ENDPOINT
};

/**
 * 合并 默认值 < 环境变量 < 显式覆盖，并校验结果。
 * @throws ZodError 任一字段不合法时
 */
export function resolveSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof LookupSettings, string | number>> = {}
): LookupSettings {
  return LookupSettingsSchema.parse({
    concurrency: overrides.concurrency ?? env.DOMAIN_LOOKUP_CONCURRENCY ?? DEFAULT_SETTINGS.concurrency,
    timeoutSeconds: overrides.timeoutSeconds ?? env.DOMAIN_LOOKUP_TIMEOUT ?? DEFAULT_SETTINGS.timeoutSeconds,
    bootstrapUrl: overrides.bootstrapUrl ?? env.DOMAIN_LOOKUP_BOOTSTRAP_URL ?? DEFAULT_SETTINGS.bootstrapUrl
  });
}
