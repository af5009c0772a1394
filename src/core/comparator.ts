import type { PairSummary, SchemaDiff } from '../types/comparison.js';
import type { ColumnDescriptor, Snapshot, SnapshotEntry } from '../types/index.js';
import { DuplicateLabelError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sortedDifference, sortedIntersection, toSortedSet } from './sorted-set.js';

export class MetadataComparator {
  /**
   * Compares every pair of entries, first against later, in input order.
   * The position of a label in `entries` decides whether it is reported as db1 or db2.
   */
  compareAll(entries: readonly SnapshotEntry[]): SchemaDiff[] {
    this.assertUniqueLabels(entries);

    logger.info(`Generating diff report for ${entries.length} databases`);

    let diffs: SchemaDiff[] = [];

    for (let i = 0; i < entries.length; i++) {
      for (let j = i + 1; j < entries.length; j++) {
        const first = entries[i];
        const second = entries[j];
        logger.info(`Comparing ${first.label} vs ${second.label}`);

        diffs = diffs.concat(this.comparePair(first.label, first.snapshot, second.label, second.snapshot));
      }
    }

    return diffs;
  }

  comparePair(label1: string, snapshot1: Snapshot, label2: string, snapshot2: Snapshot): SchemaDiff[] {
    const diffs: SchemaDiff[] = [];

    const tables1 = toSortedSet(snapshot1.keys());
    const tables2 = toSortedSet(snapshot2.keys());

    // 1. Tables only in db1
    for (const table of sortedDifference(tables1, tables2)) {
      diffs.push({
        type: 'MISSING_TABLE',
        table,
        column: '',
        details: `Table exists in ${label1} but not in ${label2}`,
        db1: label1,
        db2: label2,
      });
    }

    // 2. Tables only in db2
    for (const table of sortedDifference(tables2, tables1)) {
      diffs.push({
        type: 'EXTRA_TABLE',
        table,
        column: '',
        details: `Table exists in ${label2} but not in ${label1}`,
        db1: label1,
        db2: label2,
      });
    }

    // 3. Column structure of shared tables
    for (const table of sortedIntersection(tables1, tables2)) {
      this.compareColumns(table, snapshot1.get(table) ?? [], snapshot2.get(table) ?? [], label1, label2, diffs);
    }

    return diffs;
  }

  private compareColumns(
    table: string,
    columns1: readonly ColumnDescriptor[],
    columns2: readonly ColumnDescriptor[],
    label1: string,
    label2: string,
    diffs: SchemaDiff[]
  ) {
    const cols1 = indexColumns(columns1);
    const cols2 = indexColumns(columns2);

    const names1 = toSortedSet(cols1.keys());
    const names2 = toSortedSet(cols2.keys());

    for (const name of sortedDifference(names1, names2)) {
      const col = cols1.get(name);
      if (!col) continue;

      diffs.push({
        type: 'MISSING_COLUMN',
        table,
        column: name,
        details: `Column exists in ${label1} but not in ${label2} (type: ${col.dataType}, nullable: ${String(col.isNullable)})`,
        db1: label1,
        db2: label2,
      });
    }

    for (const name of sortedDifference(names2, names1)) {
      const col = cols2.get(name);
      if (!col) continue;

      diffs.push({
        type: 'EXTRA_COLUMN',
        table,
        column: name,
        details: `Column exists in ${label2} but not in ${label1} (type: ${col.dataType}, nullable: ${String(col.isNullable)})`,
        db1: label1,
        db2: label2,
      });
    }

    for (const name of sortedIntersection(names1, names2)) {
      const col1 = cols1.get(name);
      const col2 = cols2.get(name);
      if (!col1 || !col2) continue;

      const parts: string[] = [];
      if (col1.dataType !== col2.dataType) {
        parts.push(`data_type: ${label1}=${col1.dataType} vs ${label2}=${col2.dataType}`);
      }
      // Strict equality: 'YES' and true are different representations, not the same value.
      if (col1.isNullable !== col2.isNullable) {
        parts.push(`nullable: ${label1}=${String(col1.isNullable)} vs ${label2}=${String(col2.isNullable)}`);
      }

      if (parts.length > 0) {
        diffs.push({
          type: 'COLUMN_MISMATCH',
          table,
          column: name,
          details: parts.join('; '),
          db1: label1,
          db2: label2,
        });
      }
    }
  }

  private assertUniqueLabels(entries: readonly SnapshotEntry[]) {
    const seen = new Set<string>();
    for (const { label } of entries) {
      if (seen.has(label)) throw new DuplicateLabelError(label);
      seen.add(label);
    }
  }
}

// A repeated column name resolves to its last descriptor.
function indexColumns(columns: readonly ColumnDescriptor[]): Map<string, ColumnDescriptor> {
  return new Map(columns.map(c => [c.name, c]));
}

/** Difference counts per database pair, in the order the pairs were compared. */
export function summarizeByPair(diffs: readonly SchemaDiff[]): PairSummary[] {
  const pairs = new Map<string, PairSummary>();

  for (const diff of diffs) {
    const key = JSON.stringify([diff.db1, diff.db2]);
    const summary = pairs.get(key);
    if (summary) {
      summary.count++;
    } else {
      pairs.set(key, { db1: diff.db1, db2: diff.db2, count: 1 });
    }
  }

  return Array.from(pairs.values());
}
