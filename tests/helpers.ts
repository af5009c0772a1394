import type { QueryResultRow } from 'pg';
import type { IDbConnection } from '../src/db/connection.js';
import type { ColumnDescriptor, Snapshot } from '../src/types/index.js';

export function col(name: string, dataType: string, isNullable: string | boolean): ColumnDescriptor {
  return { name, dataType, isNullable };
}

export function snapshot(tables: Record<string, ColumnDescriptor[]>): Snapshot {
  return new Map(Object.entries(tables));
}

/** In-process stand-in for a PostgreSQL connection that answers every query with fixed rows. */
export class FakeConnection implements IDbConnection {
  queries: { text: string; params?: unknown[] }[] = [];
  closed = false;

  constructor(private rows: QueryResultRow[]) {}

  async query(text: string, params?: unknown[]): Promise<QueryResultRow[]> {
    this.queries.push({ text, params });
    return this.rows;
  }

  async close() {
    this.closed = true;
  }
}
