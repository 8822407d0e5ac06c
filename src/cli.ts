#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { AppContext, createAppContext } from './appContext';
import { config } from './config/config';
import { ImportResult } from './itinerary/flightImporter';
import { MonitorSnapshot } from './monitor/jobMonitor';
import { startServer } from './server';
import { errorMessage } from './utils/errorHandler';

export function formatImportResult(result: ImportResult): string[] {
  const lines = [
    `Imported: ${result.imported}`,
    `Already present: ${result.skipped}`,
    `Registrations: ${result.registrations.join(', ') || '-'}`,
    `Scrape jobs created: ${result.jobsCreated}`,
  ];
  for (const rowError of result.errors) {
    lines.push(`Row ${rowError.rowIndex}: ${rowError.message}`);
  }
  return lines;
}

export function formatSnapshot(snapshot: MonitorSnapshot): string[] {
  const { counts } = snapshot;
  const lines = [
    `Queue: ${snapshot.paused ? 'paused' : 'running'} (concurrency ${snapshot.concurrency})`,
    `Jobs: ${snapshot.total} total, ${counts.queued} queued, ${counts.running} running, ${counts.retrying} retrying, ` +
      `${counts.succeeded} succeeded, ${counts.failed} failed`,
  ];
  if (snapshot.etaMs !== null && snapshot.etaMs > 0) {
    lines.push(`ETA: ${Math.ceil(snapshot.etaMs / 1000)}s`);
  }
  lines.push(
    snapshot.nextRescanIn ? `Next rescan: ${snapshot.nextRescanIn}` : 'Next rescan: none scheduled'
  );
  for (const failed of snapshot.failedJobs) {
    lines.push(`FAILED ${failed.registration} @ ${failed.source}: ${failed.error ?? 'unknown error'}`);
  }
  return lines;
}

export interface ImportRun {
  recovered: number;
  result: ImportResult;
  snapshot: MonitorSnapshot;
}

/**
 * Re-dispatches jobs an earlier run left queued, imports the rows and waits
 * until the queue has drained (or is paused).
 */
export async function importAndScrape(ctx: AppContext, rows: unknown[], importSource: string): Promise<ImportRun> {
  const recovered = await ctx.orchestrator.recover();
  const result = await ctx.importer.importFlights(rows, importSource);
  await ctx.orchestrator.waitForIdle();
  return { recovered, result, snapshot: await ctx.monitor.snapshot() };
}

async function main() {
  const program = new Command();

  program
    .name('tailspotter')
    .description('Find spotter photos of the aircraft in your flight log')
    .version('1.0.0');

  program
    .command('serve')
    .description('Start the API server and the scrape queue')
    .option('-p, --port <port>', 'Port to listen on')
    .action(async (options: { port?: string }) => {
      const port = options.port === undefined ? config.server.port : Number(options.port);
      if (!Number.isInteger(port) || port < 0) {
        console.error(chalk.red(`Invalid port: ${options.port}`));
        process.exit(1);
      }
      const { shutdown } = await startServer({ ...config, server: { port } });
      const onSignal = (signal: string) => {
        shutdown(signal)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error(chalk.red(`Shutdown failed: ${errorMessage(error)}`));
            process.exit(1);
          });
      };
      process.on('SIGTERM', () => onSignal('SIGTERM'));
      process.on('SIGINT', () => onSignal('SIGINT'));
    });

  program
    .command('import <file>')
    .description('Import a JSON array of flight rows and scrape the new registrations')
    .option('-s, --source <name>', 'Label stored with each imported flight')
    .action(async (file: string, options: { source?: string }) => {
      const rows: unknown = await fs.readJson(path.resolve(file));
      if (!Array.isArray(rows)) {
        console.error(chalk.red(`${file} must contain a JSON array of flight rows`));
        process.exit(1);
      }

      const ctx = await createAppContext(config);
      const { recovered, result, snapshot } = await importAndScrape(ctx, rows, options.source ?? path.basename(file));
      if (recovered > 0) {
        console.log(chalk.gray(`Resumed ${recovered} scrape job(s) left queued by an earlier run`));
      }
      for (const line of formatImportResult(result)) {
        console.log(line.startsWith('Row ') ? chalk.yellow(line) : chalk.green(line));
      }
      for (const line of formatSnapshot(snapshot)) {
        console.log(line.startsWith('FAILED') ? chalk.red(line) : chalk.gray(line));
      }
    });

  program
    .command('status')
    .description('Print queue progress and failed jobs')
    .action(async () => {
      const ctx = await createAppContext(config);
      for (const line of formatSnapshot(await ctx.monitor.snapshot())) {
        console.log(line.startsWith('FAILED') ? chalk.red(line) : line);
      }
      console.log(`Photos waiting for review: ${await ctx.reviewQueue.pendingCount()}`);
    });

  await program.parseAsync();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  });
}
