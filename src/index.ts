export type {
  ClientLookupResult,
  DomainLookupRecord,
  DomainLookupResult,
  FailedLookupResult,
  LookupSettings,
  LookupSource,
  LookupStatus,
  RdapBootstrapService,
  ResolvedLookupResult
} from "./shared/types";
export { LookupError, type LookupErrorKey } from "./shared/errors";
export { DEFAULT_SETTINGS, resolveSettings } from "./shared/settings";
export { queryBatch, type QueryBatchDeps } from "./shared/utils/batch";
export { DomainChecker, type DomainCheck, type LookupClient } from "./shared/utils/checkPipeline";
export { IANA_RDAP_BOOTSTRAP_ENDPOINT, RdapBootstrap, type FetchLike } from "./shared/utils/rdapBootstrap";
export { RdapClient } from "./shared/utils/rdapQuery";
export { parseWhoisResponse, WhoisClient } from "./shared/utils/whoisQuery";
export { formatResultLine, toResultRecord } from "./shared/utils/status";
