import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { createRuntime, loadConfig } from '@studyrag/core';

/**
 * Status information about the studyrag index.
 */
export interface StatusInfo {
  health: 'ok' | 'degraded' | 'not_initialized';
  pages: number;
  chunks: number;
  schools: number;
  facts: number;
  embeddingModel: string;
  dimensions: number;
  llmModel: string;
  reranker: string;
  storagePath: string;
}

export const NOT_INITIALIZED: StatusInfo = {
  health: 'not_initialized',
  pages: 0,
  chunks: 0,
  schools: 0,
  facts: 0,
  embeddingModel: 'unknown',
  dimensions: 0,
  llmModel: 'unknown',
  reranker: 'disabled',
  storagePath: '',
};

/**
 * Format status info for human-readable terminal output.
 */
export function formatStatus(status: StatusInfo): string {
  const lines: string[] = [];

  lines.push(chalk.bold('studyrag status'));
  lines.push('');

  const healthColor =
    status.health === 'ok'
      ? chalk.green
      : status.health === 'degraded'
        ? chalk.yellow
        : chalk.red;

  lines.push(`  Health:       ${healthColor(status.health)}`);
  lines.push(`  Pages:        ${chalk.cyan(String(status.pages))}`);
  lines.push(`  Chunks:       ${chalk.cyan(String(status.chunks))}`);
  lines.push(`  Schools:      ${chalk.cyan(String(status.schools))}`);
  lines.push(`  Facts:        ${chalk.cyan(String(status.facts))}`);
  lines.push(`  Embedding:    ${chalk.cyan(`${status.embeddingModel} (${status.dimensions}d)`)}`);
  lines.push(`  LLM:          ${chalk.cyan(status.llmModel)}`);
  lines.push(`  Reranker:     ${chalk.cyan(status.reranker)}`);
  lines.push(`  Storage:      ${chalk.dim(status.storagePath)}`);

  return lines.join('\n');
}

/**
 * Format status info as JSON.
 */
export function formatStatusJSON(status: StatusInfo): string {
  return JSON.stringify(status, null, 2);
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the current studyrag index status')
    .option('--json', 'Output in JSON format')
    .action(async (options: { json?: boolean }) => {
      const print = (status: StatusInfo): void => {
        // eslint-disable-next-line no-console
        console.log(options.json ? formatStatusJSON(status) : formatStatus(status));
      };

      try {
        const rootDir = process.cwd();

        const configResult = await loadConfig(rootDir);
        if (configResult.isErr()) {
          print(NOT_INITIALIZED);
          if (!options.json) {
            // eslint-disable-next-line no-console
            console.log(chalk.yellow('\nRun "studyrag init" to initialize the project.'));
          }
          return;
        }
        const config = configResult.value;

        const runtimeResult = await createRuntime({ rootDir });
        if (runtimeResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(runtimeResult.error.message));
          process.exit(1);
        }
        const runtime = runtimeResult.value;

        const [chunks, pages, schools] = await Promise.all([
          runtime.store.count(),
          runtime.store.listPages(),
          runtime.store.listSchools(),
        ]);
        runtime.close();

        const reachable = chunks.isOk() && pages.isOk() && schools.isOk();
        const chunkCount = chunks.unwrapOr(0);
        print({
          health: reachable && chunkCount > 0 ? 'ok' : 'degraded',
          pages: pages.map((list) => list.length).unwrapOr(0),
          chunks: chunkCount,
          schools: schools.map((list) => list.length).unwrapOr(0),
          facts: runtime.facts?.size ?? 0,
          embeddingModel: config.embedding.model,
          dimensions: config.embedding.dimensions,
          llmModel: config.llm.model,
          reranker: config.reranker?.enabled ? `${config.reranker.provider} (${config.reranker.model})` : 'disabled',
          storagePath: resolve(rootDir, config.storage.path),
        });
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Status check failed:'), message);
        process.exit(1);
      }
    });
}
