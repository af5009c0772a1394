import Table from 'cli-table3';
import type { DiffType, PairSummary, SchemaDiff } from '../types/comparison.js';

const SAMPLE_SIZE = 5;
const RULE = '='.repeat(80);

/** Console summary lines: counts per kind plus a handful of samples for each. */
export function formatDiffSummary(diffs: readonly SchemaDiff[], reportPath: string): string[] {
  const lines = [`\nSchema Differences Detected (${diffs.length} total)`, RULE];

  const byType = new Map<DiffType, SchemaDiff[]>();
  for (const diff of diffs) {
    const group = byType.get(diff.type);
    if (group) group.push(diff);
    else byType.set(diff.type, [diff]);
  }

  const types = Array.from(byType.keys()).sort();
  for (const type of types) {
    const group = byType.get(type) ?? [];
    lines.push(`\n${type}: ${group.length} occurrence(s)`);

    for (const diff of group.slice(0, SAMPLE_SIZE)) {
      const target = diff.column ? `${diff.table}.${diff.column}` : diff.table;
      lines.push(`  • ${target}: ${diff.details}`);
    }
    if (group.length > SAMPLE_SIZE) {
      lines.push(`  ... and ${group.length - SAMPLE_SIZE} more`);
    }
  }

  lines.push(`\nFull Differences report saved to: ${reportPath}`, RULE);
  return lines;
}

export function buildPairTable(summaries: readonly PairSummary[]): Table.Table {
  // cli-table3 types every instance as a union of layouts; rows here are plain arrays.
  const table = new Table({
    head: ['Database 1', 'Database 2', 'Differences'],
    colWidths: [30, 30, 15],
  }) as Table.Table;

  summaries.forEach(s => {
    table.push([s.db1, s.db2, String(s.count)]);
  });

  return table;
}
