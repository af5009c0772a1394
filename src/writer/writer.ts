import dayjs from 'dayjs';
import fs from 'fs-extra';
import path from 'path';
import type { SnapshotDocument } from '../types/index.js';
import { logger } from '../utils/logger.js';

export function runTimestamp(date: Date = new Date()): string {
  return dayjs(date).format('YYYYMMDD_HHmmss');
}

/**
 * Writes extracted snapshots as `{timestamp}-{position}-{label}-metadata.json` files.
 * The 1-based position keeps names distinct when two labels sanitize to the same text.
 */
export class SnapshotWriter {
  constructor(private outputDir: string, private timestamp: string) {}

  getFilePath(position: number, label: string): string {
    const safeLabel = label.replace(/[^A-Za-z0-9_.-]/g, '_');
    return path.join(this.outputDir, `${this.timestamp}-${position}-${safeLabel}-metadata.json`);
  }

  async write(position: number, label: string, document: SnapshotDocument): Promise<string> {
    await fs.ensureDir(this.outputDir);
    const filePath = this.getFilePath(position, label);

    await fs.writeJson(filePath, document, { spaces: 2 });
    logger.info(`Metadata snapshot for ${label} saved to ${filePath}`);
    return filePath;
  }
}
