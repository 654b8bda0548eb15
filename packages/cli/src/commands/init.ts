import { Command } from 'commander';
import chalk from 'chalk';
import { writeFile, mkdir, access } from 'node:fs/promises';
import { join } from 'node:path';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, serializeConfig } from '@studyrag/core';

/**
 * Check if Ollama is reachable at the default endpoint.
 */
async function checkOllama(): Promise<{ ok: boolean; message: string }> {
  const host = process.env['OLLAMA_HOST'] ?? 'http://localhost:11434';
  try {
    const response = await globalThis.fetch(`${host}/api/tags`, {
      signal: AbortSignal.timeout(3000),
    });
    if (response.ok) {
      return { ok: true, message: `Ollama is running at ${host}` };
    }
    return { ok: false, message: `Ollama returned status ${response.status}` };
  } catch {
    return { ok: false, message: `Ollama is not reachable at ${host}` };
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Create ${CONFIG_FILE_NAME} and the storage directory in the current directory`)
    .option('--force', 'Overwrite existing configuration file')
    .action(async (options: { force?: boolean }) => {
      try {
        const rootDir = process.cwd();
        const configPath = join(rootDir, CONFIG_FILE_NAME);

        if (!options.force && (await exists(configPath))) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(`${CONFIG_FILE_NAME} already exists.`), 'Use --force to overwrite.');
          process.exit(1);
        }

        await writeFile(configPath, serializeConfig(), 'utf-8');
        // eslint-disable-next-line no-console
        console.log(chalk.green('Created'), configPath);

        const storageDir = join(rootDir, DEFAULT_CONFIG.storage.path);
        await mkdir(storageDir, { recursive: true });
        // eslint-disable-next-line no-console
        console.log(chalk.green('Created'), storageDir);

        const ollamaStatus = await checkOllama();
        if (ollamaStatus.ok) {
          // eslint-disable-next-line no-console
          console.log(chalk.green('✔'), ollamaStatus.message);
        } else {
          // eslint-disable-next-line no-console
          console.log(chalk.yellow('⚠'), ollamaStatus.message);
          // eslint-disable-next-line no-console
          console.log(
            chalk.dim(
              `  Pull the models before ingesting: ollama pull ${DEFAULT_CONFIG.embedding.model} && ollama pull ${DEFAULT_CONFIG.llm.model}`,
            ),
          );
        }

        // eslint-disable-next-line no-console
        console.log(chalk.green('\nstudyrag initialized.'), 'Next: studyrag ingest <crawl-output>');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Init failed:'), message);
        process.exit(1);
      }
    });
}
