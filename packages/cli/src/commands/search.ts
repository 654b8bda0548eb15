import { Command } from 'commander';
import chalk from 'chalk';
import { createRuntime } from '@studyrag/core';
import { createConsoleLogger } from '../logger.js';
import { formatEvidence } from './format.js';
import { parseRetrievalOptions } from './options.js';

export interface RetrievalCommandOptions {
  school?: string;
  pageType?: string;
  topK?: string;
  expand?: boolean;
  rerank: boolean;
  json?: boolean;
  verbose?: boolean;
}

/** Options shared by `search` and `rag`. */
export function addRetrievalOptions(command: Command): Command {
  return command
    .option('--school <id>', 'Only search pages of this school')
    .option('--page-type <type>', 'Only search pages of this type (faq, checklist, admissions, reddit, general)')
    .option('--top-k <n>', 'Maximum number of passages (default from config)')
    .option('--expand', 'Also search paraphrases of the query')
    .option('--no-rerank', 'Keep similarity order even when a reranker is configured')
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Log each retrieval stage');
}

export function registerSearchCommand(program: Command): void {
  addRetrievalOptions(
    program
      .command('search')
      .description('Retrieve sanity-checked passages without generating an answer')
      .argument('<query>', 'Search query'),
  ).action(async (query: string, options: RetrievalCommandOptions) => {
    try {
      const settings = parseRetrievalOptions(options);
      if (settings.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(settings.error));
        process.exit(1);
      }

      const runtimeResult = await createRuntime({
        rootDir: process.cwd(),
        rerank: options.rerank,
        logger: createConsoleLogger({ verbose: options.verbose }),
      });
      if (runtimeResult.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(runtimeResult.error.message));
        process.exit(1);
      }
      const runtime = runtimeResult.value;

      const bundle = await runtime.pipeline.run(query, {
        ...settings.value,
        expand: options.expand ?? false,
      });
      runtime.close();

      if (bundle.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('Search failed:'), bundle.error.message);
        process.exit(1);
      }

      // eslint-disable-next-line no-console
      console.log(options.json ? JSON.stringify(bundle.value, null, 2) : formatEvidence(bundle.value));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      // eslint-disable-next-line no-console
      console.error(chalk.red('Search failed:'), message);
      process.exit(1);
    }
  });
}
