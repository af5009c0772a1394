import { describe, expect, it } from 'vitest';
import type { SchemaDiff } from '../src/types/comparison.js';
import { buildPairTable, formatDiffSummary } from '../src/utils/summary.js';

function missingTable(table: string): SchemaDiff {
  return {
    type: 'MISSING_TABLE',
    table,
    column: '',
    details: 'Table exists in db1 but not in db2',
    db1: 'db1',
    db2: 'db2',
  };
}

describe('formatDiffSummary', () => {
  it('groups by kind in alphabetical order with column-qualified samples', () => {
    const diffs: SchemaDiff[] = [
      missingTable('orders'),
      {
        type: 'COLUMN_MISMATCH',
        table: 'users',
        column: 'id',
        details: 'data_type: db1=int vs db2=bigint',
        db1: 'db1',
        db2: 'db2',
      },
    ];

    expect(formatDiffSummary(diffs, '/out/r.csv')).toEqual([
      '\nSchema Differences Detected (2 total)',
      '='.repeat(80),
      '\nCOLUMN_MISMATCH: 1 occurrence(s)',
      '  • users.id: data_type: db1=int vs db2=bigint',
      '\nMISSING_TABLE: 1 occurrence(s)',
      '  • orders: Table exists in db1 but not in db2',
      '\nFull Differences report saved to: /out/r.csv',
      '='.repeat(80),
    ]);
  });

  it('shows five samples per kind and counts the rest', () => {
    const diffs = ['t1', 't2', 't3', 't4', 't5', 't6', 't7'].map(missingTable);
    const lines = formatDiffSummary(diffs, 'r.csv');

    expect(lines.filter(l => l.startsWith('  • '))).toHaveLength(5);
    expect(lines[2]).toBe('\nMISSING_TABLE: 7 occurrence(s)');
    expect(lines[7]).toBe('  • t5: Table exists in db1 but not in db2');
    expect(lines[8]).toBe('  ... and 2 more');
  });

  it('adds no overflow line for exactly five', () => {
    const lines = formatDiffSummary(['a', 'b', 'c', 'd', 'e'].map(missingTable), 'r.csv');
    expect(lines.some(l => l.includes('more'))).toBe(false);
  });
});

describe('buildPairTable', () => {
  it('adds one row per pair', () => {
    const table = buildPairTable([
      { db1: 'a', db2: 'b', count: 3 },
      { db1: 'a', db2: 'c', count: 1 },
    ]);

    expect(table.length).toBe(2);
    expect(table[1]).toEqual(['a', 'c', '1']);
  });
});
