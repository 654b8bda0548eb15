import { describe, it, expect } from 'vitest';
import {
  LOW_RELIABILITY_BANNER,
  buildAnswerPrompt,
  formatEvidenceForPrompt,
  formatFacts,
  formatPassage,
  formatPassages,
} from './prompts.js';
import type { AnnotatedCandidate, EvidenceBundle, SanityFlag, SchoolFacts } from '../types/search.js';

function candidate(id: string, text: string, flags: SanityFlag[] = []): AnnotatedCandidate {
  const sourceUrl = `https://www.cmu.edu/${id}`;
  return {
    chunk: {
      id: `${id}:0`,
      pageId: id,
      chunkIndex: 0,
      schoolId: 'cmu',
      sourceUrl,
      pageType: 'faq',
      text,
      startOffset: 0,
      endOffset: text.length,
      metadata: { school_id: 'cmu', page_type: 'faq', source_url: sourceUrl },
    },
    similarity: 0.9,
    flags,
  };
}

const TOEFL_FLAG: SanityFlag = {
  rule: 'toefl_out_of_range',
  factType: 'toefl',
  value: 550,
  matchedText: 'TOEFL 550',
  reason: 'TOEFL score 550 exceeds the iBT maximum of 120; possibly a paper-based score',
};

const CMU_FACTS: SchoolFacts = {
  schoolId: 'cmu',
  university: 'Carnegie Mellon University',
  program: 'MSCS',
  officialLink: 'https://www.cmu.edu/grad',
  requirements: { toeflMinTotal: 100, toeflRequired: true, greStatus: 'Optional' },
  deadlines: { fall: 'December 10' },
};

function bundle(overrides: Partial<EvidenceBundle> = {}): EvidenceBundle {
  return {
    query: 'What TOEFL score does CMU need?',
    candidates: [],
    flags: [],
    caveats: [],
    reliability: 'normal',
    facts: [],
    ...overrides,
  };
}

describe('formatFacts', () => {
  it('should render the known fields in a fixed order', () => {
    expect(formatFacts(CMU_FACTS)).toBe(
      'Carnegie Mellon University / MSCS (https://www.cmu.edu/grad): ' +
        'Fall deadline: December 10 | TOEFL minimum: 100 (required) | GRE: Optional',
    );
  });

  it('should say when a school has no structured data', () => {
    expect(
      formatFacts({ schoolId: 'mit', university: 'MIT', requirements: {}, deadlines: {} }),
    ).toBe('MIT: no structured data');
  });
});

describe('formatPassage', () => {
  it('should number the source and show its origin', () => {
    expect(formatPassage(candidate('faq', 'GRE is optional.'), 1)).toBe(
      '--- Source 2 (cmu, faq) https://www.cmu.edu/faq ---\nGRE is optional.',
    );
  });

  it('should put a caveat block above flagged text', () => {
    expect(formatPassage(candidate('old', 'TOEFL 550 required.', [TOEFL_FLAG]), 0)).toBe(
      [
        '--- Source 1 (cmu, faq) https://www.cmu.edu/old ---',
        '[CAVEAT: suspicious data, verify before citing]',
        `  - [toefl_out_of_range] ${TOEFL_FLAG.reason}`,
        'TOEFL 550 required.',
      ].join('\n'),
    );
  });

  it('should say when there are no passages', () => {
    expect(formatPassages([])).toBe('No matching passages found.');
  });
});

describe('formatEvidenceForPrompt', () => {
  it('should lead with the banner when reliability is low', () => {
    const text = formatEvidenceForPrompt(
      bundle({ reliability: 'low', candidates: [candidate('old', 'TOEFL 550 required.', [TOEFL_FLAG])] }),
    );

    expect(text.startsWith(LOW_RELIABILITY_BANNER)).toBe(true);
  });

  it('should list caveats and ask for unresolved ones to be called out', () => {
    const text = formatEvidenceForPrompt(
      bundle({
        facts: [CMU_FACTS],
        caveats: [
          {
            rule: 'toefl_out_of_range',
            value: 550,
            chunkId: 'old:0',
            schoolId: 'cmu',
            sourceUrl: 'https://www.cmu.edu/old',
            resolved: false,
          },
        ],
      }),
    );

    expect(text.split('\n\n')).toEqual([
      `Structured facts:\n- ${formatFacts(CMU_FACTS)}`,
      'No matching passages found.',
      'Caveats:\n- toefl_out_of_range value 550 at https://www.cmu.edu/old (unresolved)',
      'For each unresolved caveat, say that the source shows the value but it looks wrong, ' +
        'and suggest confirming on the official page.',
    ]);
  });

  it('should name the corroborating passage of a resolved caveat', () => {
    const text = formatEvidenceForPrompt(
      bundle({
        caveats: [
          {
            rule: 'gpa_zero',
            value: 0,
            chunkId: 'old:0',
            schoolId: 'cmu',
            sourceUrl: 'https://www.cmu.edu/old',
            resolved: true,
            corroboratedBy: 'faq:0',
          },
        ],
      }),
    );

    expect(text).toContain('- gpa_zero value 0 at https://www.cmu.edu/old (corroborated by faq:0)');
    expect(text).not.toContain('For each unresolved caveat');
  });
});

describe('buildAnswerPrompt', () => {
  it('should end with the question', () => {
    const prompt = buildAnswerPrompt(bundle());

    expect(prompt.endsWith('--- Question ---\nWhat TOEFL score does CMU need?')).toBe(true);
    expect(prompt).toContain('--- Reference material ---\nNo matching passages found.');
  });
});
