export interface ConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  schema?: string;
}

export interface DatabaseConfig extends ConnectionConfig {
  label: string;
  schema: string;
}

/** Column descriptor as stored in a snapshot file. */
export interface RawColumnDescriptor {
  column_name: string;
  data_type: string;
  is_nullable: string | boolean;
}

/** Serialized snapshot: table name -> columns in ordinal order. */
export type SnapshotDocument = Record<string, RawColumnDescriptor[]>;

export interface ColumnDescriptor {
  readonly name: string;
  readonly dataType: string;
  // Kept in whatever form the source stored it ('YES'/'NO' or a boolean).
  readonly isNullable: string | boolean;
}

export type Snapshot = ReadonlyMap<string, readonly ColumnDescriptor[]>;

export interface SnapshotSource {
  label: string;
  sourceId: string;
}

export interface SnapshotEntry {
  label: string;
  snapshot: Snapshot;
}
