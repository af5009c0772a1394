export { loadDatabaseConfigs, parseSnapshotSources } from './config/config.js';
export { MetadataCache, parseSnapshot } from './core/cache.js';
export type { SnapshotReader } from './core/cache.js';
export { MetadataComparator, summarizeByPair } from './core/comparator.js';
export { DiffOrchestrator, extractSnapshots } from './core/orchestrator.js';
export type { ConnectionFactory, ReportOptions, ReportResult } from './core/orchestrator.js';
export { DbConnection } from './db/connection.js';
export type { IDbConnection } from './db/connection.js';
export { MetadataInspector } from './inspector/inspector.js';
export type * from './types/comparison.js';
export type * from './types/index.js';
export * from './utils/errors.js';
export { DiffReportExporter } from './utils/exporter.js';
export { maskString } from './utils/mask.js';
export { buildPairTable, formatDiffSummary } from './utils/summary.js';
export { SnapshotWriter, runTimestamp } from './writer/writer.js';
