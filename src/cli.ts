#!/usr/bin/env node

import { Command } from 'commander';

import { loadPipelineConfig } from './config/pipelineConfig';
import { createLogger } from './logger';
import { runPipeline } from './pipeline';
import { SqliteEventStore } from './store/sqliteStore';

function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Ingest new and modified exports, then rebuild all artifacts')
    .argument('[file]', 'Reprocess only this file, ignoring the manifest (a bare name is looked up in the input directory)')
    .option('--full-reset', 'Delete the event store and manifest, then re-ingest every file (takes precedence over [file])', false)
    .action(async (file: string | undefined, options: { fullReset: boolean }) => {
      const config = loadPipelineConfig();
      const logger = createLogger(config.logLevel);
      const store = new SqliteEventStore({ databaseFile: config.databaseFile });
      try {
        const summary = await runPipeline({
          config,
          store,
          logger,
          forceFile: file,
          fullReset: options.fullReset
        });
        if (summary.totals.failed > 0) {
          process.exitCode = 2;
        }
      } finally {
        store.close();
      }
    });
}

function registerManifestCommand(program: Command): void {
  program
    .command('manifest')
    .description('List processed files recorded in the manifest')
    .option('--json', 'Print JSON instead of a table', false)
    .action(async (options: { json: boolean }) => {
      const config = loadPipelineConfig();
      const store = new SqliteEventStore({ databaseFile: config.databaseFile });
      await store.init();
      try {
        const entries = store.listManifest();
        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }
        if (entries.length === 0) {
          console.log(`No files processed yet in ${store.getDatabasePath()}.`);
          return;
        }
        for (const entry of entries) {
          const columns = [
            entry.filename,
            entry.extractedDate ?? '-',
            String(entry.rowCount),
            entry.processedAt,
            entry.contentHash.slice(0, 12)
          ];
          console.log(columns.join('\t'));
        }
      } finally {
        store.close();
      }
    });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('engagement-pipeline')
    .description('Batch ingestion of telemetry exports into enriched engagement artifacts')
    .version('0.1.0');

  registerRunCommand(program);
  registerManifestCommand(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
