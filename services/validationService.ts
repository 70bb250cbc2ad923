import { z } from 'zod';
import { ValidationError } from './errors.ts';

export const JUDGE_NAME_PATTERN = /^[a-z0-9]$|^[a-z0-9][a-z0-9-]*[a-z0-9]$/;

const optionalInt = z.number().int().optional();

export const judgeNameSchema = z
  .string()
  .regex(
    JUDGE_NAME_PATTERN,
    'must be lowercase alphanumeric with hyphens, cannot start or end with a hyphen'
  );

export const createJudgeSchema = z
  .object({
    name: judgeNameSchema,
    criterion: z.string(),
    instructions: z.string(),
    min_score: z.number().int().default(1),
    max_score: z.number().int().default(5),
  })
  .refine((v) => v.max_score > v.min_score, {
    message: 'max_score must be greater than min_score',
    path: ['max_score'],
  });

export const feedbackSchema = z.object({
  input_text: z.string(),
  expert_feedback: z.string().refine((s) => s.trim().length > 0, 'expert_feedback must not be empty'),
  expert_score: optionalInt,
  judge_output: z.string().optional(),
  judge_score: optionalInt,
});

export const judgeRequestSchema = z.object({
  input_text: z.string(),
  context: z.string().optional(),
});

export const principleTextSchema = z.string().trim().min(1, 'principle text must not be empty');

const nullToUndefined = (value: unknown): unknown => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== null));
};

/**
 * Parses `input` against `schema`, turning zod issues into a ValidationError.
 * Top-level nulls are treated as absent, matching optional JSON fields.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(nullToUndefined(input));
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
