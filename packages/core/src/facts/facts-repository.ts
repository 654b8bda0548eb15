import { ok, err, type Result } from 'neverthrow';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SchoolFacts } from '../types/search.js';
import { errorMessage } from '../utils/logger.js';

export class FactsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FactsError';
  }
}

const testSchema = z
  .object({
    min_total: z.number().nullish(),
    is_required: z.boolean().optional(),
  })
  .passthrough();

/** One program record, in the shape the crawler's structured extraction writes. */
const programRecordSchema = z.object({
  school_id: z.string().min(1),
  university: z.string().min(1),
  program: z.string().optional(),
  official_link: z.string().optional(),
  requirements: z
    .object({
      toefl: testSchema.optional(),
      ielts: testSchema.optional(),
      gre: z.object({ status: z.string().optional() }).passthrough().optional(),
      minimum_gpa: z.number().nullish(),
      recommendation_letters: z.number().int().nullish(),
      interview_required: z.union([z.boolean(), z.string()]).optional(),
    })
    .default({}),
  deadlines: z
    .object({
      fall_intake: z.string().nullish(),
      spring_intake: z.string().nullish(),
    })
    .default({}),
});

const factsFileSchema = z.array(programRecordSchema);

type ProgramRecord = z.infer<typeof programRecordSchema>;

const NOT_AVAILABLE = 'Not Available';

function deadline(value: string | null | undefined): string | undefined {
  return value && value !== NOT_AVAILABLE ? value : undefined;
}

function toSchoolFacts(record: ProgramRecord): SchoolFacts {
  const { requirements: req, deadlines } = record;
  const facts: SchoolFacts = {
    schoolId: record.school_id,
    university: record.university,
    requirements: {},
    deadlines: {},
  };
  if (record.program) facts.program = record.program;
  if (record.official_link) facts.officialLink = record.official_link;

  if (req.toefl?.min_total != null) facts.requirements.toeflMinTotal = req.toefl.min_total;
  if (req.toefl?.is_required !== undefined) facts.requirements.toeflRequired = req.toefl.is_required;
  if (req.ielts?.min_total != null) facts.requirements.ieltsMinTotal = req.ielts.min_total;
  if (req.ielts?.is_required !== undefined) facts.requirements.ieltsRequired = req.ielts.is_required;
  if (req.gre?.status) facts.requirements.greStatus = req.gre.status;
  if (req.minimum_gpa != null) facts.requirements.minimumGpa = req.minimum_gpa;
  if (req.recommendation_letters != null) {
    facts.requirements.recommendationLetters = req.recommendation_letters;
  }
  if (req.interview_required !== undefined) {
    facts.requirements.interviewRequired = String(req.interview_required);
  }

  const fall = deadline(deadlines.fall_intake);
  const spring = deadline(deadlines.spring_intake);
  if (fall) facts.deadlines.fall = fall;
  if (spring) facts.deadlines.spring = spring;
  return facts;
}

/** Structured per-school admission facts, keyed by school id. */
export class FactsRepository {
  private readonly bySchool: ReadonlyMap<string, SchoolFacts>;

  constructor(facts: readonly SchoolFacts[] = []) {
    this.bySchool = new Map(facts.map((f) => [f.schoolId, f]));
  }

  static fromJSON(data: unknown): Result<FactsRepository, FactsError> {
    const parsed = factsFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      return err(new FactsError(`Invalid facts file: ${issues}`));
    }
    return ok(new FactsRepository(parsed.data.map(toSchoolFacts)));
  }

  static async load(path: string): Promise<Result<FactsRepository, FactsError>> {
    let data: unknown;
    try {
      data = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      return err(new FactsError(`Failed to read facts file ${path}: ${errorMessage(error)}`));
    }
    return FactsRepository.fromJSON(data);
  }

  get size(): number {
    return this.bySchool.size;
  }

  get(schoolId: string): SchoolFacts | undefined {
    return this.bySchool.get(schoolId);
  }

  /** Facts for each known id, in first-appearance order, without duplicates. */
  forSchools(schoolIds: Iterable<string>): SchoolFacts[] {
    const seen = new Set<string>();
    const facts: SchoolFacts[] = [];
    for (const id of schoolIds) {
      const entry = this.bySchool.get(id);
      if (entry && !seen.has(id)) {
        seen.add(id);
        facts.push(entry);
      }
    }
    return facts;
  }
}
