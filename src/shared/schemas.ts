import { z } from "zod";

/**
 * IANA RDAP Bootstrap 文件：services 为 [[tld...], [endpoint...]] 列表。
 * 成员不足两项的条目在索引阶段跳过。
 */
export const RdapBootstrapFileSchema = z.object({
  services: z.array(z.array(z.array(z.string())))
});

export const RdapEventSchema = z.object({
  eventAction: z.string(),
  eventDate: z.string()
});

export const RdapEntitySchema = z.object({
  roles: z.array(z.string()),
  vcardArray: z.unknown().optional()
});

/**
 * RDAP domain 对象只解析用到的字段，其余字段忽略；
 * 单个 event / entity 结构不符时单独跳过；字段为 null 或非数组时视为缺失。
 */
export const RdapDomainSchema = z.object({
  events: z.array(z.unknown()).nullish().catch(undefined),
  entities: z.array(z.unknown()).nullish().catch(undefined)
});

/**
 * jCard：["vcard", [[name, params, type, value, ...], ...]]
 */
export const VCardArraySchema = z.tuple([z.string(), z.array(z.unknown())]).rest(z.unknown());

export const VCardTextPropertySchema = z
  .tuple([z.string(), z.unknown(), z.unknown(), z.string()])
  .rest(z.unknown());

export const LookupSettingsSchema = z.object({
  concurrency: z.coerce.number().int().min(1),
  timeoutSeconds: z.coerce.number().positive(),
  bootstrapUrl: z.string().url()
});
