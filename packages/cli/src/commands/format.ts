import chalk from 'chalk';
import {
  describeAction,
  formatFacts,
  type AgentRun,
  type AnnotatedCandidate,
  type Caveat,
  type EvidenceBundle,
  type TriadEvaluation,
} from '@studyrag/core';

const PREVIEW_LENGTH = 240;

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH)}...` : flat;
}

/**
 * Format a single candidate for terminal display.
 */
export function formatCandidate(candidate: AnnotatedCandidate, index: number): string {
  const { chunk } = candidate;
  const rank = chalk.dim(`[${index + 1}]`);
  const scores = [`similarity: ${chalk.green(candidate.similarity.toFixed(4))}`];
  if (candidate.relevance !== undefined) {
    scores.push(`relevance: ${chalk.green(candidate.relevance.toFixed(2))}`);
  }

  const lines = [
    `${rank} ${chalk.cyan(chunk.schoolId)}  ${chalk.magenta(chunk.pageType)}  ${scores.join('  ')}`,
    `    ${chalk.dim(chunk.sourceUrl)}`,
    `    ${preview(chunk.text)}`,
  ];
  for (const flag of candidate.flags) {
    lines.push(`    ${chalk.yellow(`⚠ ${flag.rule}:`)} ${flag.reason}`);
  }
  return lines.join('\n');
}

function formatCaveat(caveat: Caveat): string {
  const status = caveat.resolved
    ? chalk.green(`resolved by ${caveat.corroboratedBy ?? 'another passage'}`)
    : chalk.yellow('unresolved');
  return `  - ${caveat.rule} (${caveat.value}) ${chalk.dim(caveat.sourceUrl)} ${status}`;
}

export function formatEvidence(bundle: EvidenceBundle): string {
  const sections: string[] = [];

  if (bundle.reliability === 'low') {
    sections.push(
      chalk.red.bold('Low reliability: every passage contains a suspicious value. Check the official website.'),
    );
  }

  if (bundle.candidates.length === 0) {
    sections.push(chalk.yellow('No results found.'));
  } else {
    sections.push(chalk.bold(`Found ${bundle.candidates.length} passage(s) for "${bundle.query}":`));
    sections.push(bundle.candidates.map(formatCandidate).join('\n\n'));
  }

  if (bundle.caveats.length > 0) {
    sections.push([chalk.bold('Caveats:'), ...bundle.caveats.map(formatCaveat)].join('\n'));
  }
  if (bundle.facts.length > 0) {
    sections.push([chalk.bold('Structured facts:'), ...bundle.facts.map((f) => `  ${formatFacts(f)}`)].join('\n'));
  }

  return sections.join('\n\n');
}

export function formatAgentSteps(run: AgentRun): string {
  const lines = [chalk.bold(`Agent stopped: ${run.termination} after ${run.steps.length} search(es)`)];
  for (const step of run.steps) {
    const origin = step.origin === 'verification' ? chalk.magenta(' [verification]') : '';
    const outcome = step.error
      ? chalk.red(`failed: ${step.error.message}`)
      : `${step.candidates.length} passage(s)${step.flags.length > 0 ? chalk.yellow(`, ${step.flags.length} flag(s)`) : ''}`;
    lines.push(`  ${step.index + 1}. ${describeAction(step.action)}${origin} -> ${outcome}`);
  }
  return lines.join('\n');
}

/** `AgentRun` with step errors as `{name, message}`, which JSON.stringify would otherwise drop. */
export function agentRunJSON(run: AgentRun): Record<string, unknown> {
  return {
    ...run,
    steps: run.steps.map(({ error, ...step }) =>
      error ? { ...step, error: { name: error.name, message: error.message } } : step,
    ),
  };
}

/** Sources cited under a generated answer. */
export function formatSources(bundle: EvidenceBundle): string {
  const urls = [...new Set(bundle.candidates.map((c) => c.chunk.sourceUrl))];
  if (urls.length === 0) {
    return '';
  }
  return [chalk.bold('Sources:'), ...urls.map((url, i) => `  ${i + 1}. ${url}`)].join('\n');
}

/** RAG triad scores, one line per metric. */
export function formatEvaluation(evaluation: TriadEvaluation): string {
  const lines = [chalk.bold('Evaluation:')];
  for (const entry of evaluation.scores) {
    const detail = entry.error ? chalk.red(`failed: ${entry.error}`) : entry.reasoning;
    lines.push(`  ${entry.metric.padEnd(18)} ${entry.score}/5${detail ? `  ${detail}` : ''}`);
  }
  lines.push(`  ${'average'.padEnd(18)} ${evaluation.average.toFixed(2)}`);
  return lines.join('\n');
}
