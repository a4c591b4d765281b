import { z, type ZodTypeAny } from 'zod';
import { invalidParameter } from '../errors.js';
import type { QueryLimits } from '../config.js';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

export const optionalId = z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional());

export const requiredId = z.coerce.number().int().positive();

export const optionalText = z.preprocess(
  blankToUndefined,
  z
    .string()
    .transform((value) => value.trim())
    .optional()
);

export function paginationShape(limits: QueryLimits) {
  return {
    limit: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().min(1).max(limits.maxLimit).default(limits.defaultLimit)
    ),
    offset: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(0)),
  };
}

/**
 * Parses caller input, turning the first zod issue into an
 * InvalidParameterError that names the parameter.
 */
export function parseParams<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const parameter = issue?.path.length ? issue.path.join('.') : 'input';
  throw invalidParameter(parameter, `invalid ${parameter}: ${issue?.message ?? 'invalid value'}`, parsed.error.flatten());
}

/** A single positive integer id, e.g. from a path segment or a CLI argument. */
export function parseId(parameter: string, value: unknown): number {
  const parsed = requiredId.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  const message = parsed.error.issues[0]?.message ?? 'invalid value';
  throw invalidParameter(parameter, `invalid ${parameter}: ${message}`, parsed.error.flatten());
}
