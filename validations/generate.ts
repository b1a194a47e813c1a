import { z } from 'zod';

import { MAX_DIGITS } from '../services/codeGenerator.js';

const MAX_U64 = 2n ** 64n - 1n;

// z.coerce.number() would turn '' into 0, so integers are matched as text first.
const intString = (label: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a non-negative integer`)
    .transform(Number)
    .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER, `${label} is too large`));

export const seedSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (!/^\d+$/.test(value) || BigInt(value) > MAX_U64) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'seed must be an unsigned 64-bit integer' });
      return z.NEVER;
    }
    // Canonical decimal form, so "042" and "42" give the same sequence.
    return BigInt(value).toString();
  });

export const minHammingDistanceSchema = intString('min_hamming_distance');

export const digitsSchema = intString('digits').pipe(
  z.number().min(1, 'digits must be at least 1').max(MAX_DIGITS, `digits must be at most ${MAX_DIGITS}`)
);

export const maxAttemptsSchema = intString('max-attempts').pipe(z.number().min(1, 'max-attempts must be at least 1'));

export type CodeRequest = { prefix: string; count: number };

/**
 * "78" asks for 78 codes without a prefix; "AB3:78" for 78 codes prefixed "AB3".
 * Only the first ':' separates prefix and count.
 */
export const codeRequestSchema = z.string().transform((raw, ctx): CodeRequest => {
  const sep = raw.indexOf(':');
  const prefix = sep === -1 ? '' : raw.slice(0, sep);
  const countText = sep === -1 ? raw : raw.slice(sep + 1);

  if (/[\\/\0]/.test(prefix)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `prefix "${prefix}" must not contain path separators` });
    return z.NEVER;
  }
  const count = intString('count').safeParse(countText);
  if (!count.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid request "${raw}": expected N or PREFIX:N` });
    return z.NEVER;
  }
  return { prefix, count: count.data };
});

export const generateArgsSchema = z.object({
  seed: seedSchema.optional(),
  minHammingDistance: minHammingDistanceSchema,
  digits: digitsSchema,
  requests: z.array(codeRequestSchema).min(1, 'at least one request (N or PREFIX:N) is required'),
  existing: z.array(z.string().min(1)).default([]),
  outDir: z.string().trim().min(1).optional(),
  maxAttempts: maxAttemptsSchema.optional(),
});

export type GenerateArgs = z.infer<typeof generateArgsSchema>;
