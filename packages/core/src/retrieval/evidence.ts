import type {
  AnnotatedCandidate,
  Caveat,
  EvidenceBundle,
  FactType,
  Reliability,
  SanityRule,
  SchoolFacts,
} from '../types/search.js';
import { PAGE_TYPE_AUTHORITY } from '../chunker/page-type.js';
import { plausibleValues } from './sanity-checker.js';

export const RULE_FACT_TYPE: Readonly<Record<SanityRule, FactType>> = {
  gpa_out_of_range: 'gpa',
  gpa_zero: 'gpa',
  toefl_out_of_range: 'toefl',
  ielts_out_of_range: 'ielts',
  gre_out_of_range: 'gre',
  tuition_suspiciously_high: 'tuition',
};

const FACT_MENTION: Readonly<Record<FactType, RegExp>> = {
  gpa: /\b(?:gpa|grade\s+point\s+average)\b/i,
  toefl: /\btoefl\b/i,
  ielts: /\bielts\b/i,
  gre: /\bgre\b/i,
  tuition: /\btuition\b|\$\s*\d/i,
};

export function mentionsFact(text: string, factType: FactType): boolean {
  return FACT_MENTION[factType].test(text);
}

/** One unresolved caveat per flag, in candidate order. */
export function caveatsFor(candidates: readonly AnnotatedCandidate[]): Caveat[] {
  return candidates.flatMap((candidate) =>
    candidate.flags.map((flag) => ({
      rule: flag.rule,
      value: flag.value,
      chunkId: candidate.chunk.id,
      schoolId: candidate.chunk.schoolId,
      sourceUrl: candidate.chunk.sourceUrl,
      resolved: false,
    })),
  );
}

/**
 * Marks a caveat resolved when an unflagged passage from the same school
 * states a plausible value of the same fact type. The most authoritative
 * such passage is recorded as the corroborator. Returns new caveat objects.
 */
export function resolveCaveats(
  caveats: readonly Caveat[],
  corroborating: readonly AnnotatedCandidate[],
): Caveat[] {
  return caveats.map((caveat) => {
    if (caveat.resolved) {
      return caveat;
    }
    const factType = RULE_FACT_TYPE[caveat.rule];
    let match: AnnotatedCandidate | undefined;
    for (const candidate of corroborating) {
      if (
        candidate.flags.length > 0 ||
        candidate.chunk.schoolId !== caveat.schoolId ||
        candidate.chunk.id === caveat.chunkId ||
        plausibleValues(candidate.chunk.text, factType).length === 0
      ) {
        continue;
      }
      if (!match || PAGE_TYPE_AUTHORITY[candidate.chunk.pageType] < PAGE_TYPE_AUTHORITY[match.chunk.pageType]) {
        match = candidate;
      }
    }
    return match ? { ...caveat, resolved: true, corroboratedBy: match.chunk.id } : caveat;
  });
}

/** `low` when there is evidence and every piece of it carries a flag. */
export function reliabilityOf(candidates: readonly AnnotatedCandidate[]): Reliability {
  return candidates.length > 0 && candidates.every((candidate) => candidate.flags.length > 0)
    ? 'low'
    : 'normal';
}

export interface EvidenceInput {
  query: string;
  candidates: AnnotatedCandidate[];
  /** Defaults to one unresolved caveat per flag. */
  caveats?: Caveat[];
  /** Defaults to the reliability of `candidates`. */
  reliability?: Reliability;
  facts?: SchoolFacts[];
}

export function buildEvidenceBundle(input: EvidenceInput): EvidenceBundle {
  return {
    query: input.query,
    candidates: input.candidates,
    flags: input.candidates.flatMap((candidate) => candidate.flags),
    caveats: input.caveats ?? caveatsFor(input.candidates),
    reliability: input.reliability ?? reliabilityOf(input.candidates),
    facts: input.facts ?? [],
  };
}
