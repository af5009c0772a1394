import fs from 'fs-extra';
import { z } from 'zod';
import type { ColumnDescriptor, Snapshot } from '../types/index.js';
import { LoadError, MalformedMetadataError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type SnapshotReader = (sourceId: string) => Promise<string>;

// Used as a shape check only: zod rebuilds records without a "__proto__" key, which is a legal table name.
const documentSchema = z.record(z.string(), z.unknown());

const columnListSchema = z.array(z.record(z.string(), z.unknown()));

const columnSchema = z.object({
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.union([z.string(), z.boolean()]),
});

async function readSnapshotFile(sourceId: string): Promise<string> {
  return fs.readFile(sourceId, 'utf8');
}

/**
 * Parses and validates one serialized snapshot.
 * Shape problems raise LoadError, a bad column descriptor raises MalformedMetadataError.
 */
export function parseSnapshot(sourceId: string, text: string): Snapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new LoadError(sourceId, 'not valid JSON', { cause: error });
  }

  const document = documentSchema.safeParse(raw);
  if (!document.success || typeof raw !== 'object' || raw === null) {
    throw new LoadError(sourceId, 'expected an object mapping table names to column lists', {
      cause: document.success ? undefined : document.error,
    });
  }

  const snapshot = new Map<string, readonly ColumnDescriptor[]>();

  for (const [table, value] of Object.entries(raw)) {
    const rawColumns = columnListSchema.safeParse(value);
    if (!rawColumns.success) {
      throw new LoadError(sourceId, `table "${table}" is not a list of column objects`, {
        cause: rawColumns.error,
      });
    }

    const columns = rawColumns.data.map((rawColumn, index) => {
      const column = columnSchema.safeParse(rawColumn);
      if (!column.success) {
        const field = column.error.issues[0]?.path[0];
        throw new MalformedMetadataError(sourceId, table, index, String(field ?? 'column'));
      }
      return {
        name: column.data.column_name,
        dataType: column.data.data_type,
        isNullable: column.data.is_nullable,
      };
    });
    snapshot.set(table, columns);
  }

  return snapshot;
}

/**
 * Per-run snapshot cache. Each source id is read and parsed at most once;
 * concurrent loads of the same source share the in-flight read.
 */
export class MetadataCache {
  private snapshots = new Map<string, Promise<Snapshot>>();

  constructor(private reader: SnapshotReader = readSnapshotFile) {}

  load(sourceId: string): Promise<Snapshot> {
    const cached = this.snapshots.get(sourceId);
    if (cached) return cached;

    const pending = this.read(sourceId).catch((error: unknown) => {
      this.snapshots.delete(sourceId);
      throw error;
    });
    this.snapshots.set(sourceId, pending);
    return pending;
  }

  get size(): number {
    return this.snapshots.size;
  }

  private async read(sourceId: string): Promise<Snapshot> {
    let text: string;
    try {
      text = await this.reader(sourceId);
    } catch (error) {
      throw new LoadError(sourceId, error instanceof Error ? error.message : String(error), { cause: error });
    }

    const snapshot = parseSnapshot(sourceId, text);
    logger.debug({ sourceId, tables: snapshot.size }, 'Loaded metadata snapshot');
    return snapshot;
  }
}
