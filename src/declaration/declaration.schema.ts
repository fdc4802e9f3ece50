import { z } from 'zod';

const ACTION_REF_PATTERN = /^([A-Za-z0-9_.-]+(?:\/[A-Za-z0-9_.-]+)*)@([A-Za-z0-9_.-]+)$/;
const JOB_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;
/** Keys that would reach Object.prototype when the jobs record is rebuilt. */
const RESERVED_JOB_IDS = new Set(['__proto__', 'constructor', 'prototype']);
/** Longest timeout whose milliseconds still fit a timer (2^31 - 1 ms). */
export const MAX_TIMEOUT_MINUTES = 35_791;

/** YAML scalars in env blocks may come back as numbers or booleans. */
const scalarString = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const envSchema = z.record(scalarString).default({});

const paramsSchema = z.record(z.union([z.string(), z.number(), z.boolean()])).default({});

const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const triggerKindSchema = z.enum(['push', 'pull_request', 'manual']);

/** `on:` accepts a single event, a list, or a mapping keyed by event. */
const triggersSchema = z
  .union([triggerKindSchema, z.array(triggerKindSchema), z.record(z.unknown())])
  .transform((value, ctx) => {
    if (typeof value === 'string') return [value];
    if (Array.isArray(value)) return value;
    const kinds: z.infer<typeof triggerKindSchema>[] = [];
    for (const key of Object.keys(value)) {
      const parsed = triggerKindSchema.safeParse(key);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported trigger: ${key}` });
        return z.NEVER;
      }
      kinds.push(parsed.data);
    }
    return kinds;
  });

export const rawStepSchema = z
  .object({
    name: z.string().min(1).optional(),
    uses: z
      .string()
      .regex(ACTION_REF_PATTERN, 'Action reference must look like owner/name@version')
      .optional(),
    with: paramsSchema,
    run: z.string().min(1).optional(),
    shell: z.string().min(1).optional(),
    env: envSchema,
  })
  .strict()
  .superRefine((step, ctx) => {
    if ((step.uses === undefined) === (step.run === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'A step must set exactly one of "uses" or "run"',
      });
    }
    if (step.uses !== undefined && step.shell !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['shell'],
        message: '"shell" only applies to "run" steps',
      });
    }
  });

export const rawCacheSchema = z
  .object({
    key: z.string().min(1).optional(),
    paths: stringList.default([]),
    fingerprint: stringList.default([]),
  })
  .strict();

export const rawJobSchema = z
  .object({
    name: z.string().min(1).optional(),
    'runs-on': z.string().min(1),
    env: envSchema,
    'timeout-minutes': z
      .number()
      .positive()
      .max(MAX_TIMEOUT_MINUTES, `timeout-minutes must be at most ${MAX_TIMEOUT_MINUTES}`)
      .optional(),
    'continue-on-error': z.boolean().default(false),
    cache: rawCacheSchema.optional(),
    steps: z.array(rawStepSchema).min(1, 'A job needs at least one step'),
  })
  .strict();

/** Checks job ids on the document itself, before a rebuilt record can drop any. */
const jobIdsSchema = z.unknown().superRefine((jobs, ctx) => {
  if (typeof jobs !== 'object' || jobs === null || Array.isArray(jobs)) return;
  for (const id of Object.keys(jobs)) {
    if (!JOB_ID_PATTERN.test(id) || RESERVED_JOB_IDS.has(id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [id],
        message: `Invalid job id: ${id}`,
      });
    }
  }
});

export const rawPipelineSchema = z
  .object({
    name: z.string().min(1).optional(),
    on: triggersSchema.default(['push']),
    env: envSchema,
    'fail-fast': z.boolean().default(false),
    jobs: jobIdsSchema.pipe(
      z
        .record(rawJobSchema)
        .refine((jobs) => Object.keys(jobs).length > 0, 'A pipeline needs at least one job'),
    ),
  })
  .strict();

export type RawPipeline = z.infer<typeof rawPipelineSchema>;
export type RawJob = z.infer<typeof rawJobSchema>;
export type RawStep = z.infer<typeof rawStepSchema>;

export function splitActionRef(value: string): { name: string; version: string } | null {
  const match = ACTION_REF_PATTERN.exec(value);
  if (!match?.[1] || !match[2]) return null;
  return { name: match[1], version: match[2] };
}
