import type { Chunk, PageType } from './chunk.js';

/** Equality filters applied before similarity ranking. */
export interface SearchFilters {
  schoolId?: string;
  pageType?: PageType;
}

export interface SearchCandidate {
  chunk: Chunk;
  /** Distance-derived score, higher is more relevant. */
  similarity: number;
  /** Cross-encoder score, set once the candidate has been reranked. */
  relevance?: number;
}

export type FactType = 'gpa' | 'toefl' | 'ielts' | 'gre' | 'tuition';

export type SanityRule =
  | 'gpa_out_of_range'
  | 'gpa_zero'
  | 'toefl_out_of_range'
  | 'ielts_out_of_range'
  | 'gre_out_of_range'
  | 'tuition_suspiciously_high';

export interface SanityFlag {
  rule: SanityRule;
  factType: FactType;
  value: number;
  matchedText: string;
  reason: string;
}

export interface AnnotatedCandidate extends SearchCandidate {
  flags: SanityFlag[];
}

export type Reliability = 'normal' | 'low';

/** A flagged value surfaced to the consumer instead of being stated as fact. */
export interface Caveat {
  rule: SanityRule;
  value: number;
  chunkId: string;
  schoolId: string;
  sourceUrl: string;
  resolved: boolean;
  /** Unflagged passage from a more authoritative page that covers the same fact. */
  corroboratedBy?: string;
}

export interface SchoolRequirements {
  toeflMinTotal?: number;
  toeflRequired?: boolean;
  ieltsMinTotal?: number;
  ieltsRequired?: boolean;
  greStatus?: string;
  minimumGpa?: number;
  recommendationLetters?: number;
  interviewRequired?: string;
}

export interface SchoolDeadlines {
  fall?: string;
  spring?: string;
}

export interface SchoolFacts {
  schoolId: string;
  university: string;
  program?: string;
  officialLink?: string;
  requirements: SchoolRequirements;
  deadlines: SchoolDeadlines;
}

export interface EvidenceBundle {
  query: string;
  candidates: AnnotatedCandidate[];
  flags: SanityFlag[];
  caveats: Caveat[];
  reliability: Reliability;
  facts: SchoolFacts[];
}
