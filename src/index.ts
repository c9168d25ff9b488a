export {
  PRELOAD_CREATED_SENTINEL,
  KNOWN_HOSTS_HEADER,
} from "./constants.js";

export {
  isPreloadDerived,
  effectiveIncludeSubdomains,
  isForceHttps,
  knownHostFromPreload,
  type PreloadEntry,
  type KnownHostEntry,
  type PreloadList,
  type KnownHosts,
} from "./records.js";

export {
  decodePreloadList,
  readPreloadList,
} from "./preload-list.js";

export {
  decodeKnownHosts,
  encodeKnownHost,
  readKnownHosts,
} from "./known-hosts.js";

export {
  acquireSource,
  releaseSource,
  parseSourceLocator,
  type SourceFile,
  type SourceLocator,
} from "./source.js";

export {
  planReconciliation,
  selectPreloadedHosts,
  computeHostsToRemove,
  computeHostsToUpdate,
  computeEntriesToWrite,
  buildKnownHostRows,
  type ReconcilePlan,
} from "./reconcile.js";

export {
  writeKnownHostsDatabase,
  backupDatabase,
  replaceDatabase,
  renderKnownHosts,
  type WriteDatabaseOptions,
} from "./database-writer.js";

export {
  updateKnownHosts,
  buildProgram,
  type UpdateOptions,
  type ReconcileReport,
} from "./update.js";

export {
  HstsSyncError,
  AcquisitionError,
  DecodeError,
  DuplicateKeyError,
} from "./errors.js";

export {
  ConsoleLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
