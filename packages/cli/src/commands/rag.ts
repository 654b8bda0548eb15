import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createRuntime, type TriadEvaluation } from '@studyrag/core';
import { createConsoleLogger } from '../logger.js';
import { formatEvaluation, formatEvidence, formatSources } from './format.js';
import { parseRetrievalOptions } from './options.js';
import { addRetrievalOptions, type RetrievalCommandOptions } from './search.js';

type RagCommandOptions = RetrievalCommandOptions & { showPassages?: boolean; eval?: boolean };

export function registerRagCommand(program: Command): void {
  addRetrievalOptions(
    program
      .command('rag')
      .description('Answer a question from one retrieval round')
      .argument('<question>', 'Question to answer'),
  )
    .option('--show-passages', 'Print the retrieved passages before the answer')
    .option('--eval', 'Score the answer with an LLM judge (RAG triad)')
    .action(async (question: string, options: RagCommandOptions) => {
      const settings = parseRetrievalOptions(options);
      if (settings.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(settings.error));
        process.exit(1);
      }

      const spinner = ora('Loading configuration...').start();
      try {
        const runtimeResult = await createRuntime({
          rootDir: process.cwd(),
          rerank: options.rerank,
          logger: createConsoleLogger({ verbose: options.verbose }),
        });
        if (runtimeResult.isErr()) {
          spinner.fail(runtimeResult.error.message);
          process.exit(1);
        }
        const runtime = runtimeResult.value;

        spinner.text = 'Retrieving passages...';
        const bundle = await runtime.pipeline.run(question, {
          ...settings.value,
          expand: options.expand ?? false,
        });
        runtime.close();
        if (bundle.isErr()) {
          spinner.fail(`Search failed: ${bundle.error.message}`);
          process.exit(1);
        }

        spinner.text = 'Generating answer...';
        const answer = await runtime.synthesizer.answer(bundle.value);
        if (answer.isErr()) {
          spinner.fail(`Generation failed: ${answer.error.message}`);
          process.exit(1);
        }

        let evaluation: TriadEvaluation | undefined;
        if (options.eval) {
          spinner.text = 'Evaluating answer...';
          evaluation = await runtime.evaluator.evaluateAnswer(bundle.value, answer.value);
        }
        spinner.stop();

        if (options.json) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify({ answer: answer.value, evidence: bundle.value, evaluation }, null, 2));
          return;
        }
        if (options.showPassages) {
          // eslint-disable-next-line no-console
          console.log(`${formatEvidence(bundle.value)}\n`);
        }
        // eslint-disable-next-line no-console
        console.log(answer.value);
        const sources = formatSources(bundle.value);
        if (sources) {
          // eslint-disable-next-line no-console
          console.log(`\n${sources}`);
        }
        if (evaluation) {
          // eslint-disable-next-line no-console
          console.log(`\n${formatEvaluation(evaluation)}`);
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        spinner.fail(`RAG failed: ${message}`);
        process.exit(1);
      }
    });
}
