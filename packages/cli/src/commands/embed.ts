import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createRuntime } from '@studyrag/core';
import { createConsoleLogger } from '../logger.js';
import { parseFilters } from './options.js';

export function registerEmbedCommand(program: Command): void {
  program
    .command('embed')
    .description('Chunk and embed stored pages, replacing their previous chunks')
    .option('--school <id>', 'Only embed pages of this school')
    .option('--page-type <type>', 'Only embed pages of this type')
    .option('--verbose', 'Log every embedded page')
    .action(async (options: { school?: string; pageType?: string; verbose?: boolean }) => {
      const filters = parseFilters(options);
      if (filters.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(filters.error));
        process.exit(1);
      }

      const spinner = ora('Loading configuration...').start();
      try {
        const runtimeResult = await createRuntime({
          rootDir: process.cwd(),
          logger: createConsoleLogger({ verbose: options.verbose }),
        });
        if (runtimeResult.isErr()) {
          spinner.fail(runtimeResult.error.message);
          process.exit(1);
        }
        const runtime = runtimeResult.value;

        spinner.text = 'Embedding pages...';
        const startTime = Date.now();
        const report = await runtime.ingest.embedPages({
          filters: filters.value,
          onProgress: (done, total) => {
            spinner.text = `Embedding pages ${done}/${total}...`;
          },
        });
        runtime.close();

        if (report.isErr()) {
          spinner.fail(`Embedding failed: ${report.error.message}`);
          process.exit(1);
        }
        if (report.value.pages === 0) {
          spinner.warn('No pages to embed. Run "studyrag ingest <path>" first.');
          return;
        }

        const seconds = ((Date.now() - startTime) / 1000).toFixed(1);
        spinner.succeed(
          `Embedded ${report.value.chunks} chunk(s) from ${report.value.pages} page(s) in ${seconds}s`,
        );
        if (report.value.skipped.length > 0) {
          // eslint-disable-next-line no-console
          console.log(chalk.yellow(`${report.value.skipped.length} page(s) produced no chunks`));
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        spinner.fail(`Embedding failed: ${message}`);
        process.exit(1);
      }
    });
}
