import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'path';
import { summarizeByPair } from '../core/comparator.js';
import type { ReportFormat, SchemaDiff } from '../types/comparison.js';
import { logger } from './logger.js';
import { buildPairTable, formatDiffSummary } from './summary.js';

const REPORT_COLUMNS = [
  { header: 'Diff Type', key: 'type', width: 20 },
  { header: 'Table Name', key: 'table', width: 30 },
  { header: 'Column Name', key: 'column', width: 30 },
  { header: 'Database 1', key: 'db1', width: 20 },
  { header: 'Database 2', key: 'db2', width: 20 },
  { header: 'Detail', key: 'details', width: 80 },
];

export class DiffReportExporter {
  static reportFileName(timestamp: string, format: ReportFormat): string {
    return `${timestamp}-schema_differences.${format}`;
  }

  /**
   * Writes the report file and prints the console summary.
   * Returns the report path, or null when there was nothing to report.
   */
  static async export(
    diffs: readonly SchemaDiff[],
    outputDir: string,
    timestamp: string,
    format: ReportFormat = 'csv'
  ): Promise<string | null> {
    if (diffs.length === 0) {
      logger.info('No differences found between databases');
      console.log('\nAll databases are identical - no schema differences detected');
      return null;
    }

    await fs.ensureDir(outputDir);
    const outputPath = path.join(outputDir, this.reportFileName(timestamp, format));

    if (format === 'xlsx') {
      await this.exportToExcel(diffs, outputPath);
    } else {
      await this.exportToCSV(diffs, outputPath);
    }

    console.log(buildPairTable(summarizeByPair(diffs)).toString());
    for (const line of formatDiffSummary(diffs, outputPath)) {
      console.log(line);
    }

    return outputPath;
  }

  private static buildSheet(workbook: ExcelJS.Workbook, diffs: readonly SchemaDiff[]): ExcelJS.Worksheet {
    const sheet = workbook.addWorksheet('Schema Differences');
    sheet.columns = REPORT_COLUMNS;

    diffs.forEach(diff => {
      sheet.addRow({
        type: diff.type,
        table: diff.table,
        column: diff.column,
        db1: diff.db1,
        db2: diff.db2,
        details: diff.details,
      });
    });

    return sheet;
  }

  private static async exportToExcel(diffs: readonly SchemaDiff[], outputPath: string) {
    const workbook = new ExcelJS.Workbook();
    const sheet = this.buildSheet(workbook, diffs);

    // Styling header
    sheet.getRow(1).font = { bold: true };
    sheet.getRow(1).fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' }
    };

    await workbook.xlsx.writeFile(outputPath);
    logger.info(`Schema differences report saved to ${outputPath}`);
  }

  private static async exportToCSV(diffs: readonly SchemaDiff[], outputPath: string) {
    const workbook = new ExcelJS.Workbook();
    this.buildSheet(workbook, diffs);

    await workbook.csv.writeFile(outputPath);
    logger.info(`Schema differences report saved to ${outputPath}`);
  }
}
