import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { basename, resolve } from 'node:path';
import { createRuntime, loadCrawlDocuments, type SkipReason, type SkippedPage } from '@studyrag/core';
import { createConsoleLogger } from '../logger.js';

export interface IngestSummary {
  files: number;
  pages: number;
  schools: string[];
  skipped: Partial<Record<SkipReason, number>>;
  chunks?: number;
}

export function countSkipped(skipped: readonly SkippedPage[]): Partial<Record<SkipReason, number>> {
  const counts: Partial<Record<SkipReason, number>> = {};
  for (const { reason } of skipped) {
    counts[reason] = (counts[reason] ?? 0) + 1;
  }
  return counts;
}

export function formatIngestSummary(summary: IngestSummary): string {
  const lines = [
    `${chalk.bold('Files:')}   ${summary.files}`,
    `${chalk.bold('Pages:')}   ${chalk.cyan(String(summary.pages))}`,
    `${chalk.bold('Schools:')} ${summary.schools.length > 0 ? summary.schools.join(', ') : chalk.dim('none')}`,
  ];
  if (summary.chunks !== undefined) {
    lines.push(`${chalk.bold('Chunks:')}  ${chalk.cyan(String(summary.chunks))}`);
  }
  const reasons = Object.entries(summary.skipped);
  if (reasons.length > 0) {
    lines.push(chalk.yellow('Skipped:'));
    for (const [reason, count] of reasons) {
      lines.push(`  ${reason}: ${count}`);
    }
  }
  return lines.join('\n');
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Store crawled pages ({url: text} JSON) and forum posts (<school>_reddit.json) as source pages')
    .argument('<path>', 'Crawl output file, or a directory of them')
    .option('--embed', 'Chunk and embed the stored pages afterwards')
    .option('--json', 'Output the summary in JSON format')
    .option('--verbose', 'Log every skipped page')
    .action(async (path: string, options: { embed?: boolean; json?: boolean; verbose?: boolean }) => {
      const spinner = ora('Reading crawl output...').start();
      try {
        const files = await loadCrawlDocuments(resolve(path));
        if (files.isErr()) {
          spinner.fail(files.error.message);
          process.exit(1);
        }

        const logger = createConsoleLogger({ verbose: options.verbose });
        const runtimeResult = await createRuntime({ rootDir: process.cwd(), logger });
        if (runtimeResult.isErr()) {
          spinner.fail(runtimeResult.error.message);
          process.exit(1);
        }
        const runtime = runtimeResult.value;

        const skipped: SkippedPage[] = [];
        const schools = new Set<string>();
        let pages = 0;
        for (const file of files.value) {
          spinner.text = `Ingesting ${basename(file.path)}...`;
          const report = await runtime.ingest.ingestFile(file);
          if (report.isErr()) {
            runtime.close();
            spinner.fail(`Ingest failed: ${report.error.message}`);
            process.exit(1);
          }
          pages += report.value.pages;
          report.value.schools.forEach((id) => schools.add(id));
          skipped.push(...report.value.skipped);
        }

        const summary: IngestSummary = {
          files: files.value.length,
          pages,
          schools: [...schools].sort(),
          skipped: countSkipped(skipped),
        };

        if (options.embed) {
          const embedded = await runtime.ingest.embedPages({
            onProgress: (done, total) => {
              spinner.text = `Embedding pages ${done}/${total}...`;
            },
          });
          if (embedded.isErr()) {
            runtime.close();
            spinner.fail(`Embedding failed: ${embedded.error.message}`);
            process.exit(1);
          }
          summary.chunks = embedded.value.chunks;
        }

        runtime.close();
        spinner.succeed(`Ingested ${pages} page(s) from ${files.value.length} file(s)`);
        // eslint-disable-next-line no-console
        console.log(options.json ? JSON.stringify(summary, null, 2) : formatIngestSummary(summary));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        spinner.fail(`Ingest failed: ${message}`);
        process.exit(1);
      }
    });
}
