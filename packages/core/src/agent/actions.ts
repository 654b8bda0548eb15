import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { PAGE_TYPES } from '../types/chunk.js';
import type { SearchFilters } from '../types/search.js';

export interface SearchAction {
  kind: 'search';
  query: string;
  filters: SearchFilters;
}

export interface FinishAction {
  kind: 'finish';
  /** Free text the controller produced alongside its decision, if any. */
  answer?: string;
}

export type AgentAction = SearchAction | FinishAction;

export class InvalidActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidActionError';
  }
}

const searchActionSchema = z.object({
  kind: z.literal('search'),
  query: z.string().trim().min(1, 'query must not be empty'),
  filters: z
    .object({
      schoolId: z.string().trim().min(1).optional(),
      pageType: z.enum(PAGE_TYPES).optional(),
    })
    .strict()
    .default({}),
});

const finishActionSchema = z.object({
  kind: z.literal('finish'),
  answer: z.string().optional(),
});

export const agentActionSchema = z.discriminatedUnion('kind', [
  searchActionSchema,
  finishActionSchema,
]);

/** Validates a controller's raw decision into an action. */
export function decodeAction(raw: unknown): Result<AgentAction, InvalidActionError> {
  const parsed = agentActionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return err(new InvalidActionError(`Invalid action: ${issues}`));
  }

  const action = parsed.data;
  if (action.kind === 'finish') {
    return ok(action.answer === undefined ? { kind: 'finish' } : { kind: 'finish', answer: action.answer });
  }

  const filters: SearchFilters = {};
  if (action.filters.schoolId !== undefined) filters.schoolId = action.filters.schoolId;
  if (action.filters.pageType !== undefined) filters.pageType = action.filters.pageType;
  return ok({ kind: 'search', query: action.query, filters });
}

export function describeAction(action: AgentAction): string {
  if (action.kind === 'finish') {
    return 'finish()';
  }
  const args = [JSON.stringify(action.query)];
  if (action.filters.schoolId) args.push(`school=${action.filters.schoolId}`);
  if (action.filters.pageType) args.push(`page_type=${action.filters.pageType}`);
  return `search(${args.join(', ')})`;
}
