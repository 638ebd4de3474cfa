export * from './types/enums.js';
export * from './types/error.js';
export * from './types/meta.js';
export type * from './types/node.js';
export type * from './types/rule.js';
export type * from './types/status.js';

export { Collection } from './collection/Collection.js';
export * from './collection/node.js';
export * from './collection/meta.js';
export * from './collection/lookup.js';
export * from './collection/mutate.js';
export { RunContext, type RunContextOptions } from './context/RunContext.js';

export type { ManifestStore } from './manifest/ManifestStore.js';
export { XmlManifestStore, parseManifest, serializeManifest } from './manifest/xml/XmlManifestStore.js';
export { rotateBackups } from './manifest/backup.js';
export { findManifest } from './manifest/discover.js';

export { DefaultChecker, type CheckOptions } from './reconcile/DefaultChecker.js';
export { DefaultUpdater, type UpdateOptions, type AddOptions } from './reconcile/DefaultUpdater.js';
export { md5File, type ChecksumFn } from './reconcile/checksum.js';
export { isIgnored } from './reconcile/ignore.js';

export { RuleLoader } from './rules/RuleLoader.js';
export { DefaultRuleApplier } from './rules/DefaultRuleApplier.js';
export { findTarget } from './rules/target.js';
export { compilePattern } from './rules/pattern.js';

export { DependencyResolver, collectProvides, isSatisfied, formatDependency } from './deps/DependencyResolver.js';
export { compareVersions, parseVersion, versionInRange } from './deps/version.js';

export type { VerifyState } from './state/VerifyState.js';
export { MemoryVerifyState } from './state/memory/MemoryVerifyState.js';
export { SqliteVerifyState } from './state/sqlite/SqliteVerifyState.js';

export { StatusWriter } from './output/StatusWriter.js';
export { MemoryStatusSink } from './output/MemoryStatusSink.js';
export { findTags, findDescriptions, findPaths } from './query/find.js';
export { Exporter } from './query/exporter.js';
export { MetaReporter } from './query/metaReport.js';

export { runCli, type CliIo } from './cli/program.js';
