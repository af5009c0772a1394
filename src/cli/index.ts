#!/usr/bin/env node
import Table from 'cli-table3';
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadDatabaseConfigs, parseSnapshotSources } from '../config/config.js';
import { DiffOrchestrator, extractSnapshots } from '../core/orchestrator.js';
import { DriftError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { maskString } from '../utils/mask.js';
import { runTimestamp } from '../writer/writer.js';

const formatSchema = z.enum(['csv', 'xlsx']);

const reportOptionsSchema = z.object({
  outputDir: z.string().default(path.join(process.cwd(), 'files', 'reports')),
  timestamp: z.string().min(1).optional(),
  format: formatSchema.default('csv'),
});

const extractOptionsSchema = z.object({
  outputDir: z.string().default(path.join(process.cwd(), 'files', 'metadata')),
  timestamp: z.string().min(1).optional(),
});

const runOptionsSchema = z.object({
  metadataDir: z.string().default(path.join(process.cwd(), 'files', 'metadata')),
  outputDir: z.string().default(path.join(process.cwd(), 'files', 'reports')),
  format: formatSchema.default('csv'),
});

function handleError(error: unknown): never {
  if (error instanceof z.ZodError) {
    logger.error({ errors: error.issues }, 'Invalid configuration');
  } else if (error instanceof DriftError) {
    logger.error({ error: error.name }, error.message);
  } else {
    logger.error(error, 'Error during execution');
  }
  process.exit(1);
}

export async function runCli(argv: string[] = process.argv) {
  const program = new Command();

  program
    .name('pgdrift')
    .description('Detect table and column drift between PostgreSQL databases')
    .version('1.0.0');

  program
    .command('extract')
    .description('Extract column metadata from every configured database into JSON snapshots')
    .option('-o, --output-dir <string>', 'Directory for the metadata snapshots')
    .option('-t, --timestamp <string>', 'Timestamp prefix for the snapshot files')
    .action(async (options: unknown) => {
      try {
        const validated = extractOptionsSchema.parse(options);
        const timestamp = validated.timestamp ?? runTimestamp();
        const sources = await extractSnapshots(loadDatabaseConfigs(), validated.outputDir, timestamp);
        logger.info(`Extracted ${sources.length} metadata snapshot(s)`);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('diff')
    .description('Compare metadata snapshots and report differences between every pair')
    .argument('<sources...>', 'Snapshots to compare as label=path, in report order')
    .option('-o, --output-dir <string>', 'Directory for the differences report')
    .option('-t, --timestamp <string>', 'Timestamp prefix for the report file')
    .option('-f, --format <string>', 'Report format (csv or xlsx)', 'csv')
    .action(async (sources: string[], options: unknown) => {
      try {
        const validated = reportOptionsSchema.parse(options);
        const orchestrator = new DiffOrchestrator(parseSnapshotSources(sources));
        await orchestrator.run({
          outputDir: validated.outputDir,
          timestamp: validated.timestamp ?? runTimestamp(),
          format: validated.format,
        });
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('run')
    .description('Extract metadata from every configured database, then report differences')
    .option('-m, --metadata-dir <string>', 'Directory for the metadata snapshots')
    .option('-o, --output-dir <string>', 'Directory for the differences report')
    .option('-f, --format <string>', 'Report format (csv or xlsx)', 'csv')
    .action(async (options: unknown) => {
      try {
        const validated = runOptionsSchema.parse(options);
        const timestamp = runTimestamp();
        const sources = await extractSnapshots(loadDatabaseConfigs(), validated.metadataDir, timestamp);
        await new DiffOrchestrator(sources).run({
          outputDir: validated.outputDir,
          timestamp,
          format: validated.format,
        });
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('config')
    .description('Show the configured databases with secrets masked')
    .action(() => {
      try {
        const table = new Table({
          head: ['Label', 'Host', 'Port', 'User', 'Password', 'Database', 'Schema'],
        }) as Table.Table;

        loadDatabaseConfigs().forEach(c => {
          table.push([c.label, c.host, c.port, c.user, maskString(c.password ?? ''), c.database, c.schema]);
        });

        console.log(table.toString());
      } catch (error) {
        handleError(error);
      }
    });

  await program.parseAsync(argv);
}

/** True when `scriptPath` (possibly a bin symlink) resolves to the module at `moduleUrl`. */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) return false;
  return fs.realpathSync(scriptPath) === fs.realpathSync(fileURLToPath(moduleUrl));
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  runCli().catch(handleError);
}
