import { z } from 'zod';
import { InvalidInputError } from '../errors.js';
import type { ClipTarget, VodTarget } from '../types/target.js';

const MAX_U64 = 2n ** 64n - 1n;

export const loginSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z0-9_]{1,25}$/, 'login must be 1-25 letters, digits or underscores');

export const videoIdSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .transform((v) => String(v).trim())
  .refine((v) => /^\d{1,20}$/.test(v) && BigInt(v) <= MAX_U64, 'video id must be an unsigned 64-bit integer')
  .transform((v) => BigInt(v).toString());

const secondsSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const vodTargetSchema = z
  .object({
    login: loginSchema,
    videoId: videoIdSchema,
    mode: z.discriminatedUnion('kind', [
      z.object({ kind: z.literal('exact'), timestamp: secondsSchema }),
      z.object({ kind: z.literal('range'), from: secondsSchema, to: secondsSchema }),
    ]),
  })
  .refine((t) => t.mode.kind !== 'range' || t.mode.from <= t.mode.to, {
    message: 'range start must not be after its end',
    path: ['mode'],
  });

const clipTargetSchema = z
  .object({
    videoId: videoIdSchema,
    start: secondsSchema,
    end: secondsSchema,
    stride: z.number().int().positive().default(1),
  })
  .refine((t) => t.start <= t.end, 'start offset must not be after the end offset');

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new InvalidInputError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export interface VodTargetInput {
  login: string;
  videoId: string | number | bigint;
  mode: { kind: 'exact'; timestamp: number } | { kind: 'range'; from: number; to: number };
}

export interface ClipTargetInput {
  videoId: string | number | bigint;
  start: number;
  end: number;
  stride?: number;
}

export function validateVodTarget(input: VodTargetInput): VodTarget {
  return parseOrThrow(vodTargetSchema, input, 'VOD target');
}

export function validateClipTarget(input: ClipTargetInput): ClipTarget {
  return parseOrThrow(clipTargetSchema, input, 'clip target');
}

export function validateConcurrency(value: number): number {
  return parseOrThrow(z.number().int().positive(), value, 'concurrency');
}
