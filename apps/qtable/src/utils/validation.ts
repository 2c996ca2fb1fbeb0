/**
 * Hyperparameter validation schemas
 */

import { z } from 'zod';
import { ValidationError } from './errors';

const unitInterval = z.number().finite().min(0).max(1);

/** Base exploration rate; values above 1 simply always explore */
export const epsilonSchema = z.number().finite().min(0);

export const tableOptionsSchema = z.object({
  epsilon: epsilonSchema,
  maxStates: z.number().int().positive().optional(),
});

export const updateParamsSchema = z.object({
  learningRate: z.number().finite(),
  futureRewardDiscount: z.number().finite(),
});

export const learnerOptionsSchema = z.object({
  learningRate: unitInterval,
  futureRewardDiscount: unitInterval,
  maxStepsPerEpisode: z.number().int().positive(),
});

export const episodeCountSchema = z.number().int().nonnegative();

/**
 * Parse a value against a schema, raising ValidationError with the zod issues
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  message: string
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, result.error.issues);
  }
  return result.data;
}
