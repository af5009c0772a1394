import { z } from 'zod';
import type { IDbConnection } from '../db/connection.js';
import type { RawColumnDescriptor, SnapshotDocument } from '../types/index.js';
import { logger } from '../utils/logger.js';

const columnRowSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.string(),
});

export class MetadataInspector {
  constructor(private db: IDbConnection) {}

  /**
   * Reads every base table's columns in `schema`, grouped by table and kept in ordinal order.
   * `is_nullable` is stored as PostgreSQL reports it ('YES' / 'NO').
   */
  async extractSnapshot(schema: string = 'public'): Promise<SnapshotDocument> {
    const rows = columnRowSchema.array().parse(await this.db.query(`
      SELECT
        c.table_name,
        c.column_name,
        c.data_type,
        c.is_nullable
      FROM information_schema.columns c
      JOIN information_schema.tables t
        ON t.table_schema = c.table_schema
        AND t.table_name = c.table_name
      WHERE c.table_schema = $1
      AND t.table_type = 'BASE TABLE'
      ORDER BY c.table_name, c.ordinal_position
    `, [schema]));

    const tables = new Map<string, RawColumnDescriptor[]>();
    for (const row of rows) {
      let columns = tables.get(row.table_name);
      if (!columns) {
        columns = [];
        tables.set(row.table_name, columns);
      }
      columns.push({
        column_name: row.column_name,
        data_type: row.data_type,
        is_nullable: row.is_nullable,
      });
    }

    logger.info(`Found ${tables.size} tables (${rows.length} columns) in schema ${schema}`);
    return Object.fromEntries(tables);
  }
}
