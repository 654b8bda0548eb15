import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createRuntime } from '@studyrag/core';
import { createConsoleLogger } from '../logger.js';
import { agentRunJSON, formatAgentSteps, formatEvidence, formatSources } from './format.js';
import { parsePositiveInt } from './options.js';

interface AgentCommandOptions {
  maxSteps?: string;
  rerank: boolean;
  json?: boolean;
  verbose?: boolean;
  showPassages?: boolean;
}

export function registerAgentCommand(program: Command): void {
  program
    .command('agent')
    .description('Answer a question by letting the model plan several searches')
    .argument('<question>', 'Question to answer')
    .option('--max-steps <n>', 'Maximum number of searches (default from config)')
    .option('--no-rerank', 'Keep similarity order even when a reranker is configured')
    .option('--show-passages', 'Print the collected passages before the answer')
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Log each agent step')
    .action(async (question: string, options: AgentCommandOptions) => {
      let maxSteps: number | undefined;
      if (options.maxSteps !== undefined) {
        const parsed = parsePositiveInt(options.maxSteps, '--max-steps');
        if (parsed.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(parsed.error));
          process.exit(1);
        }
        maxSteps = parsed.value;
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

        spinner.text = 'Researching...';
        const run = await runtime.agent.run(question, maxSteps === undefined ? {} : { maxSteps });
        runtime.close();
        if (run.isErr()) {
          spinner.fail(`Agent failed: ${run.error.message}`);
          process.exit(1);
        }

        // Answers come from the evidence bundle, never from the controller's closing text.
        spinner.text = 'Generating answer...';
        const answer = await runtime.synthesizer.answer(run.value.evidence);
        if (answer.isErr()) {
          spinner.fail(`Generation failed: ${answer.error.message}`);
          process.exit(1);
        }
        spinner.stop();

        if (options.json) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify({ answer: answer.value, run: agentRunJSON(run.value) }, null, 2));
          return;
        }

        // eslint-disable-next-line no-console
        console.log(`${formatAgentSteps(run.value)}\n`);
        if (options.showPassages) {
          // eslint-disable-next-line no-console
          console.log(`${formatEvidence(run.value.evidence)}\n`);
        }
        // eslint-disable-next-line no-console
        console.log(answer.value);
        const sources = formatSources(run.value.evidence);
        if (sources) {
          // eslint-disable-next-line no-console
          console.log(`\n${sources}`);
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        spinner.fail(`Agent failed: ${message}`);
        process.exit(1);
      }
    });
}
