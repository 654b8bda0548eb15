import type {
  AnnotatedCandidate,
  Caveat,
  EvidenceBundle,
  SchoolFacts,
} from '../types/search.js';

export const LOW_RELIABILITY_BANNER =
  'WARNING: every retrieved passage contains a value that looks implausible. ' +
  'Tell the user the data may be wrong and point them to the official website.';

export function formatFacts(facts: SchoolFacts): string {
  const { requirements: req, deadlines } = facts;
  const parts: string[] = [];
  if (deadlines.fall) parts.push(`Fall deadline: ${deadlines.fall}`);
  if (deadlines.spring) parts.push(`Spring deadline: ${deadlines.spring}`);
  if (req.minimumGpa !== undefined) parts.push(`Minimum GPA: ${req.minimumGpa}`);
  if (req.toeflMinTotal !== undefined) {
    parts.push(`TOEFL minimum: ${req.toeflMinTotal}${req.toeflRequired ? ' (required)' : ''}`);
  }
  if (req.ieltsMinTotal !== undefined) {
    parts.push(`IELTS minimum: ${req.ieltsMinTotal}${req.ieltsRequired ? ' (required)' : ''}`);
  }
  if (req.greStatus) parts.push(`GRE: ${req.greStatus}`);
  if (req.recommendationLetters !== undefined) {
    parts.push(`Recommendation letters: ${req.recommendationLetters}`);
  }
  if (req.interviewRequired) parts.push(`Interview: ${req.interviewRequired}`);

  const title = facts.program ? `${facts.university} / ${facts.program}` : facts.university;
  const link = facts.officialLink ? ` (${facts.officialLink})` : '';
  return `${title}${link}: ${parts.length > 0 ? parts.join(' | ') : 'no structured data'}`;
}

/** One numbered source block. Flagged passages carry a caveat block above the text. */
export function formatPassage(candidate: AnnotatedCandidate, index: number): string {
  const { chunk, flags } = candidate;
  const lines = [`--- Source ${index + 1} (${chunk.schoolId}, ${chunk.pageType}) ${chunk.sourceUrl} ---`];
  if (flags.length > 0) {
    lines.push('[CAVEAT: suspicious data, verify before citing]');
    for (const flag of flags) {
      lines.push(`  - [${flag.rule}] ${flag.reason}`);
    }
  }
  lines.push(chunk.text);
  return lines.join('\n');
}

export function formatPassages(candidates: readonly AnnotatedCandidate[]): string {
  if (candidates.length === 0) {
    return 'No matching passages found.';
  }
  return candidates.map(formatPassage).join('\n\n');
}

function formatCaveat(caveat: Caveat): string {
  const status = caveat.resolved
    ? `corroborated by ${caveat.corroboratedBy ?? 'another passage'}`
    : 'unresolved';
  return `- ${caveat.rule} value ${caveat.value} at ${caveat.sourceUrl} (${status})`;
}

/** The context block handed to the answer model. */
export function formatEvidenceForPrompt(bundle: EvidenceBundle): string {
  const sections: string[] = [];
  if (bundle.reliability === 'low') {
    sections.push(LOW_RELIABILITY_BANNER);
  }
  if (bundle.facts.length > 0) {
    sections.push(['Structured facts:', ...bundle.facts.map((f) => `- ${formatFacts(f)}`)].join('\n'));
  }
  sections.push(formatPassages(bundle.candidates));
  const open = bundle.caveats.filter((c) => !c.resolved);
  if (bundle.caveats.length > 0) {
    sections.push(['Caveats:', ...bundle.caveats.map(formatCaveat)].join('\n'));
  }
  if (open.length > 0) {
    sections.push(
      'For each unresolved caveat, say that the source shows the value but it looks wrong, ' +
        'and suggest confirming on the official page.',
    );
  }
  return sections.join('\n\n');
}

export function buildAnswerPrompt(bundle: EvidenceBundle): string {
  return [
    'You are a graduate admissions advisor for North American computer science programs.',
    'Answer the question using only the reference material below.',
    'Rules:',
    '1. Quote GPA, TOEFL, IELTS, GRE figures and deadlines exactly as given; never estimate them.',
    '2. If the material does not cover something, say so and point to the official link.',
    '3. Cite the source URL after each figure you use.',
    '4. When comparing schools, organise the answer by topic, not by school.',
    '',
    '--- Reference material ---',
    formatEvidenceForPrompt(bundle),
    '',
    '--- Question ---',
    bundle.query,
  ].join('\n');
}
