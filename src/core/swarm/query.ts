import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { PlanningError } from './swarmErrors';
import { COMPLEXITY_LEVELS, CONFIDENCE_LEVELS, Query } from './swarm-types';

export const MIN_QUESTION_CHARS = 10;

export const querySchema = z.object({
  id: z.string().min(1),
  question: z
    .string()
    .trim()
    .min(MIN_QUESTION_CHARS, `question must be at least ${MIN_QUESTION_CHARS} characters`),
  context: z.string(),
  complexity: z.enum(COMPLEXITY_LEVELS),
  requiredConfidence: z.enum(CONFIDENCE_LEVELS),
  timeLimitSec: z.number().int().min(30).max(600),
  submittedAt: z.string().min(1),
  userId: z.string().optional(),
  tags: z.array(z.string()),
});

const queryInputSchema = querySchema.extend({
  id: z.string().min(1).optional(),
  context: z.string().default(''),
  complexity: z.enum(COMPLEXITY_LEVELS).default('intermediate'),
  requiredConfidence: z.enum(CONFIDENCE_LEVELS).default('medium'),
  timeLimitSec: z.number().int().min(30).max(600).default(180),
  submittedAt: z.string().min(1).optional(),
  tags: z.array(z.string()).default([]),
});

export type QueryInput = z.input<typeof queryInputSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`);
}

function freezeQuery(data: z.output<typeof querySchema>): Query {
  return Object.freeze({ ...data, tags: Object.freeze([...data.tags]) });
}

/**
 * Build an immutable Query, filling defaults the way callers usually leave them out.
 *
 * @throws PlanningError when the input is structurally invalid.
 */
export function createQuery(input: QueryInput): Query {
  const parsed = queryInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new PlanningError(`Invalid query: ${issues.join('; ')}`, parsed.error, { issues });
  }
  return freezeQuery({
    ...parsed.data,
    id: parsed.data.id ?? randomUUID(),
    submittedAt: parsed.data.submittedAt ?? new Date().toISOString(),
  });
}

/**
 * Re-check a Query that may have been assembled outside `createQuery`.
 *
 * @throws PlanningError when the query is structurally invalid.
 */
export function assertValidQuery(query: Query): Query {
  const parsed = querySchema.safeParse(query);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new PlanningError(`Invalid query: ${issues.join('; ')}`, parsed.error, { issues });
  }
  return freezeQuery(parsed.data);
}
