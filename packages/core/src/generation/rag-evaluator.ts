import { z } from 'zod';
import type { EvidenceBundle } from '../types/search.js';
import type { LLMProvider } from '../types/provider.js';
import { formatPassages } from './prompts.js';

export type TriadMetric = 'context_relevance' | 'faithfulness' | 'answer_relevance';

export interface MetricScore {
  metric: TriadMetric;
  /** 1 to 5; 0 when the judge failed or gave no usable score. */
  score: number;
  reasoning: string;
  error?: string;
}

export interface TriadEvaluation {
  scores: MetricScore[];
  /** Mean over all three metrics, failed ones counting as 0. */
  average: number;
}

const judgementSchema = z.object({
  reasoning: z.string().default(''),
  score: z.coerce.number().finite(),
});

const SCORE_LINE = /score\s*:\s*(\d+(?:\.\d+)?)/i;

const REPLY_FORMAT = [
  'Reply with JSON only, in this shape:',
  '{"reasoning": "<your analysis>", "score": <1-5>}',
].join('\n');

function clampScore(score: number): number {
  return Math.min(Math.max(score, 1), 5);
}

/** The outermost `{...}` of a reply, parsed; undefined when there is none or it is not JSON. */
function embeddedJSON(reply: string): unknown {
  const json = reply.match(/\{[\s\S]*\}/);
  if (!json) {
    return undefined;
  }
  try {
    return JSON.parse(json[0]);
  } catch {
    return undefined;
  }
}

/**
 * Reads a judge reply: a JSON object with `reasoning` and `score`, or failing
 * that a `Score: N` line. Scores are clamped to 1..5.
 */
export function parseJudgement(reply: string): { score: number; reasoning: string } | undefined {
  const parsed = judgementSchema.safeParse(embeddedJSON(reply));
  if (parsed.success) {
    return { score: clampScore(parsed.data.score), reasoning: parsed.data.reasoning.trim() };
  }

  const line = reply.match(SCORE_LINE);
  if (!line?.[1]) {
    return undefined;
  }
  const reasoning = reply.slice(0, line.index).replace(/^\s*reasoning\s*:/i, '').trim();
  return { score: clampScore(Number.parseFloat(line[1])), reasoning };
}

export function contextRelevancePrompt(query: string, contexts: string): string {
  return [
    'You are a strict auditor of a retrieval system. Judge whether the retrieved context is enough to answer the question.',
    '',
    `Question: ${query}`,
    '',
    'Retrieved context:',
    contexts,
    '',
    'Scoring (1-5):',
    '1: Unrelated.',
    '2: A few keywords match but nothing that answers the question.',
    '3: Holds the key figures but lacks the surrounding explanation.',
    '4: Answers the question fully, with some irrelevant or redundant passages.',
    '5: Every passage is relevant, with no noise and enough depth for an expert answer.',
    '',
    REPLY_FORMAT,
  ].join('\n');
}

export function faithfulnessPrompt(answer: string, contexts: string): string {
  return [
    'Check whether the answer is based fully and only on the reference material.',
    'Any speculative statement or general-knowledge addition without a clear source in the material lowers the score.',
    '',
    'Reference material:',
    contexts,
    '',
    'Answer:',
    answer,
    '',
    'Scoring (1-5):',
    '1: Contradicts the material.',
    '2: Mostly matches, but key figures or requirements look invented.',
    '3: Broadly faithful, with some inference or outside knowledge added.',
    '4: Precise, with only minor subjective wording.',
    '5: Every claim and figure has an explicit source in the material.',
    '',
    REPLY_FORMAT,
  ].join('\n');
}

export function answerRelevancePrompt(query: string, answer: string): string {
  return [
    'Judge whether the answer resolves the question as directly as possible.',
    '',
    `Question: ${query}`,
    '',
    'Answer:',
    answer,
    '',
    'Scoring (1-5):',
    '1: Off topic or vague.',
    '2: Overloaded with background the question did not ask for.',
    '3: Correct but loosely structured; the core answer is buried.',
    '4: Clear and direct, though it could be tighter.',
    '5: Concise and precise, with nothing superfluous.',
    '',
    REPLY_FORMAT,
  ].join('\n');
}

/**
 * RAG triad: context relevance, faithfulness and answer relevance, each
 * scored 1 to 5 by an LLM judge. A failed metric scores 0 and carries the
 * error; the others are still scored.
 */
export class RagEvaluator {
  constructor(private readonly judge: LLMProvider) {}

  async evaluate(query: string, contexts: string, answer: string): Promise<TriadEvaluation> {
    const scores = [
      await this.score('context_relevance', contextRelevancePrompt(query, contexts)),
      await this.score('faithfulness', faithfulnessPrompt(answer, contexts)),
      await this.score('answer_relevance', answerRelevancePrompt(query, answer)),
    ];
    const average = scores.reduce((sum, entry) => sum + entry.score, 0) / scores.length;
    return { scores, average };
  }

  /** Judges an answer against the passages of the bundle it was written from. */
  async evaluateAnswer(bundle: EvidenceBundle, answer: string): Promise<TriadEvaluation> {
    return this.evaluate(bundle.query, formatPassages(bundle.candidates), answer);
  }

  private async score(metric: TriadMetric, prompt: string): Promise<MetricScore> {
    const reply = await this.judge.generate(prompt);
    if (reply.isErr()) {
      return { metric, score: 0, reasoning: '', error: reply.error.message };
    }
    const judgement = parseJudgement(reply.value);
    if (!judgement) {
      return { metric, score: 0, reasoning: '', error: 'Judge reply carried no score' };
    }
    return { metric, ...judgement };
  }
}
