import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerEmbedCommand } from './commands/embed.js';
import { registerSearchCommand } from './commands/search.js';
import { registerRagCommand } from './commands/rag.js';
import { registerAgentCommand } from './commands/agent.js';
import { registerStatusCommand } from './commands/status.js';

export function createProgram(version: string): Command {
  const program = new Command();
  program
    .name('studyrag')
    .description('studyrag: grounded answers to graduate admissions questions from crawled school pages')
    .version(version);

  registerInitCommand(program);
  registerIngestCommand(program);
  registerEmbedCommand(program);
  registerSearchCommand(program);
  registerRagCommand(program);
  registerAgentCommand(program);
  registerStatusCommand(program);
  return program;
}
