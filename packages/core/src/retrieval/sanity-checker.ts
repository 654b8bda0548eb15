import type {
  AnnotatedCandidate,
  FactType,
  SanityFlag,
  SanityRule,
  SearchCandidate,
} from '../types/search.js';

const MATCHED_TEXT_LIMIT = 80;

interface FactPattern {
  factType: FactType;
  /** Group 1 captures the numeric value. */
  pattern: RegExp;
  judge(value: number): { rule: SanityRule; reason: string } | undefined;
}

/**
 * Plausibility rules. Conservative: only values clearly outside the known
 * range of each scale are flagged.
 */
export const FACT_PATTERNS: readonly FactPattern[] = [
  {
    factType: 'gpa',
    pattern: /\b(?:gpa|grade\s+point\s+average)\b.*?(\d{1,2}(?:\.\d{1,2})?)(?:\s*\/\s*\d{1,2}(?:\.\d{1,2})?)?/gi,
    judge: (value) => {
      if (value > 4.5) {
        return {
          rule: 'gpa_out_of_range',
          reason: `GPA ${value} exceeds 4.5, above any 4.0 or 4.3 scale; possibly a percentage or a parsing error`,
        };
      }
      if (value === 0) {
        return { rule: 'gpa_zero', reason: 'GPA of 0 is likely a placeholder or a parsing error' };
      }
      return undefined;
    },
  },
  {
    factType: 'toefl',
    pattern: /\btoefl\b.*?(\d{2,3})/gi,
    judge: (value) =>
      value > 120
        ? {
            rule: 'toefl_out_of_range',
            reason: `TOEFL score ${value} exceeds the iBT maximum of 120; possibly a paper-based score`,
          }
        : undefined,
  },
  {
    factType: 'ielts',
    pattern: /\bielts\b.*?(\d(?:\.\d)?)/gi,
    judge: (value) =>
      value > 9
        ? { rule: 'ielts_out_of_range', reason: `IELTS band ${value} exceeds the maximum of 9.0` }
        : undefined,
  },
  {
    factType: 'gre',
    pattern: /\bgre\b.*?(\d{3})\b/gi,
    judge: (value) =>
      value < 130 || value > 340
        ? {
            rule: 'gre_out_of_range',
            reason: `GRE value ${value} is outside 130-170 per section and 260-340 in total`,
          }
        : undefined,
  },
  {
    factType: 'tuition',
    pattern: /\$\s*([\d,]+)(?:\.\d+)?\s*(?:per\s+(?:semester|year|credit))?/gi,
    judge: (value) =>
      value > 100_000
        ? {
            rule: 'tuition_suspiciously_high',
            reason: `Amount $${value.toLocaleString('en-US')} exceeds $100,000 for a single entry; possibly a multi-year total`,
          }
        : undefined,
  },
];

function parseNumber(text: string): number | undefined {
  const value = Number.parseFloat(text.replace(/,/g, ''));
  return Number.isFinite(value) ? value : undefined;
}

interface FactMatch {
  factType: FactType;
  value: number;
  matchedText: string;
  verdict: ReturnType<FactPattern['judge']>;
}

function* factMatches(text: string, patterns: readonly FactPattern[]): Generator<FactMatch> {
  for (const { factType, pattern, judge } of patterns) {
    for (const match of text.matchAll(pattern)) {
      const value = parseNumber(match[1] ?? '');
      if (value !== undefined) {
        yield { factType, value, matchedText: match[0], verdict: judge(value) };
      }
    }
  }
}

/** Flags every implausible numeric fact in `text`. The text itself is never changed. */
export function checkText(text: string): SanityFlag[] {
  const flags: SanityFlag[] = [];
  for (const { factType, value, matchedText, verdict } of factMatches(text, FACT_PATTERNS)) {
    if (verdict) {
      flags.push({
        rule: verdict.rule,
        factType,
        value,
        matchedText: matchedText.slice(0, MATCHED_TEXT_LIMIT),
        reason: verdict.reason,
      });
    }
  }
  return flags;
}

/** Values of `factType` stated in `text` that pass its plausibility rule. */
export function plausibleValues(text: string, factType: FactType): number[] {
  const patterns = FACT_PATTERNS.filter((pattern) => pattern.factType === factType);
  const values: number[] = [];
  for (const { value, verdict } of factMatches(text, patterns)) {
    if (!verdict) {
      values.push(value);
    }
  }
  return values;
}

export class SanityChecker {
  check(text: string): SanityFlag[] {
    return checkText(text);
  }

  annotate<T extends SearchCandidate>(candidates: T[]): Array<T & AnnotatedCandidate> {
    return candidates.map((candidate) => ({
      ...candidate,
      flags: this.check(candidate.chunk.text),
    }));
  }
}
