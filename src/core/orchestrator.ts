import { DbConnection, type IDbConnection } from '../db/connection.js';
import { MetadataInspector } from '../inspector/inspector.js';
import type { ReportFormat, SchemaDiff } from '../types/comparison.js';
import type { ConnectionConfig, DatabaseConfig, SnapshotEntry, SnapshotSource } from '../types/index.js';
import { DuplicateLabelError } from '../utils/errors.js';
import { DiffReportExporter } from '../utils/exporter.js';
import { logger } from '../utils/logger.js';
import { maskString } from '../utils/mask.js';
import { SnapshotWriter } from '../writer/writer.js';
import { MetadataCache } from './cache.js';
import { MetadataComparator } from './comparator.js';

export interface ReportOptions {
  outputDir: string;
  timestamp: string;
  format?: ReportFormat;
}

export interface ReportResult {
  diffs: SchemaDiff[];
  reportPath: string | null;
}

export type ConnectionFactory = (config: ConnectionConfig) => IDbConnection;

/** One report run: every source is loaded through a cache owned by this run only. */
export class DiffOrchestrator {
  private comparator = new MetadataComparator();

  constructor(
    private sources: readonly SnapshotSource[],
    private cache: MetadataCache = new MetadataCache()
  ) {}

  async loadEntries(): Promise<SnapshotEntry[]> {
    const snapshots = await Promise.all(this.sources.map(s => this.cache.load(s.sourceId)));
    return this.sources.map((s, i) => ({ label: s.label, snapshot: snapshots[i] }));
  }

  async run(options: ReportOptions): Promise<ReportResult> {
    const entries = await this.loadEntries();
    logger.info(`Loaded ${this.cache.size} metadata snapshot(s) for ${entries.length} database(s)`);

    const diffs = this.comparator.compareAll(entries);
    const reportPath = await DiffReportExporter.export(diffs, options.outputDir, options.timestamp, options.format);

    return { diffs, reportPath };
  }
}

/**
 * Extracts one snapshot file per configured database, in configuration order.
 * Returns the written files as diff sources labelled like their databases.
 */
export async function extractSnapshots(
  configs: readonly DatabaseConfig[],
  outputDir: string,
  timestamp: string,
  connect: ConnectionFactory = config => new DbConnection(config)
): Promise<SnapshotSource[]> {
  const labels = new Set<string>();
  for (const { label } of configs) {
    if (labels.has(label)) throw new DuplicateLabelError(label);
    labels.add(label);
  }

  const writer = new SnapshotWriter(outputDir, timestamp);
  const sources: SnapshotSource[] = [];

  for (const [index, config] of configs.entries()) {
    logger.info({
      label: config.label,
      host: config.host,
      port: config.port,
      user: config.user,
      password: maskString(config.password ?? ''),
      database: config.database,
      schema: config.schema,
    }, 'Extracting metadata');

    const db = connect(config);
    try {
      const document = await new MetadataInspector(db).extractSnapshot(config.schema);
      const sourceId = await writer.write(index + 1, config.label, document);
      sources.push({ label: config.label, sourceId });
    } finally {
      await db.close();
    }
  }

  return sources;
}
