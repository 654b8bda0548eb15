import { ok, err, type Result } from 'neverthrow';
import type {
  AnnotatedCandidate,
  EvidenceBundle,
  FactType,
  SanityFlag,
} from '../types/search.js';
import type { GenerationError, Logger, SearchError } from '../types/provider.js';
import type { FactsRepository } from '../facts/facts-repository.js';
import type { CandidateSearch } from '../retrieval/searcher.js';
import type { Reranker } from '../retrieval/reranker.js';
import { SanityChecker } from '../retrieval/sanity-checker.js';
import {
  buildEvidenceBundle,
  caveatsFor,
  mentionsFact,
  reliabilityOf,
  resolveCaveats,
} from '../retrieval/evidence.js';
import { RERANK_FACTOR } from '../retrieval/rag-pipeline.js';
import { silentLogger } from '../utils/logger.js';
import {
  decodeAction,
  describeAction,
  InvalidActionError,
  type AgentAction,
  type SearchAction,
} from './actions.js';

export type StepOrigin = 'controller' | 'verification';

export interface AgentStep {
  index: number;
  action: SearchAction;
  /** `verification` steps are issued by the agent itself to cross-check a flagged value. */
  origin: StepOrigin;
  candidates: AnnotatedCandidate[];
  flags: SanityFlag[];
  error?: SearchError;
}

export type TerminationReason = 'finished' | 'step_limit' | 'invalid_action' | 'controller_failed';

/** Everything a controller sees when choosing the next action. */
export interface AgentContext {
  query: string;
  steps: readonly AgentStep[];
  remainingSteps: number;
  /** Why the previous decision was rejected, when it was. */
  feedback?: string;
}

/**
 * Chooses the next action. The decision is returned raw and validated by
 * the agent, so a controller may hand back whatever its model produced.
 */
export interface AgentController {
  decide(context: AgentContext): Promise<Result<unknown, GenerationError>>;
}

export interface AgentRun {
  query: string;
  steps: AgentStep[];
  termination: TerminationReason;
  /** Text the controller attached to its finish decision. */
  answer?: string;
  evidence: EvidenceBundle;
}

export type AgentError = SearchError | GenerationError;

export interface ResearchAgentDeps {
  controller: AgentController;
  searcher: CandidateSearch;
  reranker?: Reranker | null;
  sanityChecker?: SanityChecker;
  facts?: FactsRepository | null;
  logger?: Logger;
}

export interface ResearchAgentOptions {
  maxSteps?: number;
  /** Passages kept per search step. */
  k?: number;
  rerankFactor?: number;
}

const MAX_DECISION_ATTEMPTS = 2;

const FACT_TERMS: Readonly<Record<FactType, string>> = {
  gpa: 'GPA',
  toefl: 'TOEFL',
  ielts: 'IELTS',
  gre: 'GRE',
  tuition: 'tuition',
};

interface VerificationTarget {
  key: string;
  action: SearchAction;
}

function verificationQuery(query: string, factType: FactType): string {
  return mentionsFact(query, factType) ? query : `${query} ${FACT_TERMS[factType]}`;
}

function uniqueCandidates(steps: readonly AgentStep[]): AnnotatedCandidate[] {
  const seen = new Set<string>();
  const unique: AnnotatedCandidate[] = [];
  for (const candidate of steps.flatMap((step) => step.candidates)) {
    if (!seen.has(candidate.chunk.id)) {
      seen.add(candidate.chunk.id);
      unique.push(candidate);
    }
  }
  return unique;
}

/**
 * Bounded search loop: deciding, searching, deciding ... done. Never runs
 * more than `maxSteps` searches, whatever the controller does.
 */
export class ResearchAgent {
  private readonly controller: AgentController;
  private readonly searcher: CandidateSearch;
  private readonly reranker: Reranker | null;
  private readonly sanityChecker: SanityChecker;
  private readonly facts: FactsRepository | null;
  private readonly logger: Logger;
  private readonly maxSteps: number;
  private readonly k: number;
  private readonly rerankFactor: number;

  constructor(deps: ResearchAgentDeps, options: ResearchAgentOptions = {}) {
    this.controller = deps.controller;
    this.searcher = deps.searcher;
    this.reranker = deps.reranker ?? null;
    this.sanityChecker = deps.sanityChecker ?? new SanityChecker();
    this.facts = deps.facts ?? null;
    this.logger = deps.logger ?? silentLogger;
    this.maxSteps = options.maxSteps ?? 5;
    this.k = options.k ?? 4;
    this.rerankFactor = options.rerankFactor ?? RERANK_FACTOR;
  }

  async run(query: string, options: { maxSteps?: number } = {}): Promise<Result<AgentRun, AgentError>> {
    const maxSteps = Math.max(0, options.maxSteps ?? this.maxSteps);
    const steps: AgentStep[] = [];
    const verified = new Set<string>();
    let termination: TerminationReason = 'step_limit';
    let answer: string | undefined;
    let controllerError: GenerationError | undefined;

    while (steps.length < maxSteps) {
      const decision = await this.decide(query, steps, maxSteps);
      if (decision.isErr()) {
        if (decision.error instanceof InvalidActionError) {
          termination = 'invalid_action';
        } else {
          termination = 'controller_failed';
          controllerError = decision.error;
        }
        this.logger.warn(`Agent stopped: ${decision.error.message}`);
        break;
      }

      const action = decision.value;
      if (action.kind === 'search') {
        steps.push(await this.searchStep(steps.length, action, 'controller'));
        continue;
      }

      answer = action.answer;
      await this.verifyFlags(steps, verified, maxSteps);
      termination = 'finished';
      break;
    }

    if (termination === 'step_limit') {
      this.logger.info(`Agent reached the step limit (${maxSteps})`);
    }

    const succeeded = steps.filter((step) => step.error === undefined);
    if (succeeded.length === 0) {
      const lastError = [...steps].reverse().find((step) => step.error !== undefined)?.error;
      if (lastError) {
        return err(lastError);
      }
      if (controllerError) {
        return err(controllerError);
      }
    }

    const candidates = uniqueCandidates(succeeded);
    const verification = uniqueCandidates(succeeded.filter((step) => step.origin === 'verification'));
    const schoolIds = [
      ...steps.flatMap((step) => (step.action.filters.schoolId ? [step.action.filters.schoolId] : [])),
      ...candidates.map((candidate) => candidate.chunk.schoolId),
    ];

    const evidence = buildEvidenceBundle({
      query,
      candidates,
      caveats: resolveCaveats(caveatsFor(candidates), verification),
      reliability: reliabilityOf(candidates),
      facts: this.facts?.forSchools(schoolIds) ?? [],
    });

    return ok({
      query,
      steps,
      termination,
      ...(answer !== undefined ? { answer } : {}),
      evidence,
    });
  }

  /** Asks the controller for an action, retrying once after a rejected decision. */
  private async decide(
    query: string,
    steps: readonly AgentStep[],
    maxSteps: number,
  ): Promise<Result<AgentAction, InvalidActionError | GenerationError>> {
    let feedback: string | undefined;
    let lastError: InvalidActionError | GenerationError = new InvalidActionError('No decision made');

    for (let attempt = 0; attempt < MAX_DECISION_ATTEMPTS; attempt++) {
      const raw = await this.controller.decide({
        query,
        steps,
        remainingSteps: maxSteps - steps.length,
        ...(feedback !== undefined ? { feedback } : {}),
      });
      if (raw.isErr()) {
        lastError = raw.error;
        feedback = undefined;
        this.logger.warn(`Controller failed: ${raw.error.message}`);
        continue;
      }

      const action = decodeAction(raw.value);
      if (action.isOk()) {
        return ok(action.value);
      }
      lastError = action.error;
      feedback = action.error.message;
      this.logger.warn(`Rejected controller decision: ${action.error.message}`);
    }

    return err(lastError);
  }

  private async searchStep(index: number, action: SearchAction, origin: StepOrigin): Promise<AgentStep> {
    const fetchK = this.reranker ? this.k * this.rerankFactor : this.k;
    const found = await this.searcher.search(action.query, action.filters, fetchK);
    if (found.isErr()) {
      this.logger.warn(`Step ${index + 1} ${describeAction(action)} failed: ${found.error.message}`);
      return { index, action, origin, candidates: [], flags: [], error: found.error };
    }

    const ranked = this.reranker
      ? await this.reranker.rerank(action.query, found.value, this.k)
      : found.value.slice(0, this.k);
    const candidates = this.sanityChecker.annotate(ranked);
    const flags = candidates.flatMap((candidate) => candidate.flags);

    this.logger.info(
      `Step ${index + 1} [${origin}] ${describeAction(action)}: ${candidates.length} passages, ${flags.length} flags`,
    );
    return { index, action, origin, candidates, flags };
  }

  /**
   * One FAQ-restricted search per (rule, school) among flagged non-FAQ
   * passages, while steps remain.
   */
  private async verifyFlags(steps: AgentStep[], verified: Set<string>, maxSteps: number): Promise<void> {
    let targets = this.verificationTargets(steps, verified);
    while (targets.length > 0 && steps.length < maxSteps) {
      const [target] = targets;
      if (!target) {
        break;
      }
      verified.add(target.key);
      steps.push(await this.searchStep(steps.length, target.action, 'verification'));
      targets = this.verificationTargets(steps, verified);
    }
  }

  private verificationTargets(steps: readonly AgentStep[], verified: ReadonlySet<string>): VerificationTarget[] {
    const targets: VerificationTarget[] = [];
    const pending = new Set<string>();
    for (const step of steps) {
      for (const candidate of step.candidates) {
        if (candidate.chunk.pageType === 'faq') {
          continue;
        }
        for (const flag of candidate.flags) {
          const schoolId = candidate.chunk.schoolId;
          const key = `${flag.rule}|${schoolId}`;
          if (verified.has(key) || pending.has(key)) {
            continue;
          }
          pending.add(key);
          targets.push({
            key,
            action: {
              kind: 'search',
              query: verificationQuery(step.action.query, flag.factType),
              filters: { schoolId, pageType: 'faq' },
            },
          });
        }
      }
    }
    return targets;
  }
}
