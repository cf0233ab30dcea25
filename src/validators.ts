/**
 * Zod schemas for the arguments MCP tools and CLI commands accept.
 *
 * Dates are YYYY-MM-DD calendar dates. Periods other than "custom" ignore
 * from/to; "custom" falls back to the Config tab's custom range.
 */

import { z } from 'zod';
import { isValidIsoDate } from './orchestrator/time-range.js';

const IsoDate = z
  .string()
  .trim()
  .refine(isValidIsoDate, { message: 'Expected a date as YYYY-MM-DD' });

export const LeaderboardPeriodSchema = z.enum(['daily', 'weekly', 'monthly', 'custom']);

export const PeriodLeaderboardArgsSchema = z
  .object({
    period: LeaderboardPeriodSchema.default('weekly'),
    from: IsoDate.optional(),
    to: IsoDate.optional(),
  })
  .refine((args) => !args.from || !args.to || args.from <= args.to, {
    message: '"from" must not be after "to"',
  });

export type PeriodLeaderboardArgs = z.infer<typeof PeriodLeaderboardArgsSchema>;

export const LearnerHistoryArgsSchema = z
  .object({
    learner: z.string().trim().min(1, 'learner is required'),
    from: IsoDate.optional(),
    to: IsoDate.optional(),
  })
  .refine((args) => !args.from || !args.to || args.from <= args.to, {
    message: '"from" must not be after "to"',
  });

export type LearnerHistoryArgs = z.infer<typeof LearnerHistoryArgsSchema>;

export const BackfillArgsSchema = z
  .object({
    start: IsoDate,
    end: IsoDate.optional(),
    sleep: z.coerce.number().int().min(0).default(2),
  })
  .refine((args) => !args.end || args.start <= args.end, {
    message: '"start" must not be after "end"',
  });

export type BackfillArgs = z.infer<typeof BackfillArgsSchema>;

/**
 * Parse arguments, turning zod issues into one readable message.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`Invalid arguments: ${detail}`);
  }
  return result.data;
}
