import { z } from 'zod';
import { U64_MAX } from '../constants.ts';

const UNSIGNED_DECIMAL = /^(0|[1-9]\d*)$/;

/** Canonical decimal string → bigint within [0, 2^64). */
export const u64String = z
  .string()
  .regex(UNSIGNED_DECIMAL, 'must be an unsigned decimal integer')
  .transform((s, ctx) => {
    // transforms are skipped after a failed regex, refinements are not
    const value = BigInt(s);
    if (value > U64_MAX) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'exceeds the u64 range' });
      return z.NEVER;
    }
    return value;
  });

/**
 * u64 as sent by clients: a decimal string, or a JSON number small enough to
 * survive JSON.parse without losing precision.
 */
export const u64Wire = z.union([
  u64String,
  z
    .number()
    .int()
    .nonnegative()
    .refine(Number.isSafeInteger, 'unsafe integer, send it as a decimal string')
    .transform((n) => BigInt(n)),
]);

export const formatIssues = (error: z.ZodError, prefix: (string | number)[] = []): string =>
  error.issues
    .map((issue) => `${[...prefix, ...issue.path].join('.') || 'root'}: ${issue.message}`)
    .join('\n');
