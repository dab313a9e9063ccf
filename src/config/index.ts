// Runtime configuration
// Defaults plus an optional JSON override file validated with zod

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { invalidConfigError } from '@/errors';

export const CHECKPOINT_MODES = ['all-at-once', 'staggered', 'batched'] as const;
export type CheckpointMode = (typeof CHECKPOINT_MODES)[number];

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const budgetSchema = z.object({
  checkpointThreshold: positiveInt,
  observedHardQuota: positiveInt,
});

const workerSchema = z.object({
  interRequestDelayMs: nonNegativeInt,
  maxAttempts: positiveInt,
  retryBackoffMs: nonNegativeInt,
});

const parallelSchema = z.object({
  maxWorkers: positiveInt,
  autoCalculateWorkers: z.boolean(),
  defaultWorkers: positiveInt,
  // null: one checkpoint per worker, i.e. the checkpoint threshold
  targetUnitsPerWorker: positiveInt.nullable(),
  checkpointMode: z.enum(CHECKPOINT_MODES),
  staggerIntervalMs: nonNegativeInt,
  batchSize: positiveInt,
  renderIntervalMs: positiveInt,
  etaWindowMs: positiveInt,
});

const safetyProbeSchema = z.object({
  enabled: z.boolean(),
  workers: positiveInt,
  units: positiveInt,
  minUnits: positiveInt,
  earlyLimitMargin: nonNegativeInt,
});

export const appConfigSchema = z
  .object({
    budget: budgetSchema,
    worker: workerSchema,
    parallel: parallelSchema,
    safetyProbe: safetyProbeSchema,
  })
  .superRefine((config, ctx) => {
    if (config.budget.checkpointThreshold >= config.budget.observedHardQuota) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['budget', 'checkpointThreshold'],
        message: 'checkpointThreshold must be below observedHardQuota',
      });
    }
    if (config.safetyProbe.units >= config.safetyProbe.workers * config.budget.checkpointThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['safetyProbe', 'units'],
        message: 'safetyProbe.units must stay below safetyProbe.workers × checkpointThreshold',
      });
    }
    if (config.safetyProbe.minUnits > config.safetyProbe.units) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['safetyProbe', 'minUnits'],
        message: 'safetyProbe.minUnits cannot exceed safetyProbe.units',
      });
    }
  });

export type AppConfig = z.infer<typeof appConfigSchema>;
export type BudgetConfig = AppConfig['budget'];
export type WorkerConfig = AppConfig['worker'];
export type ParallelConfig = AppConfig['parallel'];
export type SafetyProbeConfig = AppConfig['safetyProbe'];

export const defaultConfig: AppConfig = {
  budget: {
    checkpointThreshold: 55,
    observedHardQuota: 60,
  },
  worker: {
    interRequestDelayMs: 2500,
    maxAttempts: 3,
    retryBackoffMs: 2000,
  },
  parallel: {
    maxWorkers: 15,
    autoCalculateWorkers: true,
    defaultWorkers: 5,
    targetUnitsPerWorker: null,
    checkpointMode: 'all-at-once',
    staggerIntervalMs: 10000,
    batchSize: 3,
    renderIntervalMs: 1000,
    etaWindowMs: 60000,
  },
  safetyProbe: {
    enabled: true,
    workers: 2,
    units: 100,
    minUnits: 10,
    earlyLimitMargin: 5,
  },
};

/**
 * Partial override accepted from a config file or from callers
 */
export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

const overridesSchema = z
  .object({
    budget: budgetSchema.partial(),
    worker: workerSchema.partial(),
    parallel: parallelSchema.partial(),
    safetyProbe: safetyProbeSchema.partial(),
  })
  .partial()
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Merge overrides over the defaults and validate the result
 */
export function resolveConfig(overrides: ConfigOverrides = {}, base: AppConfig = defaultConfig): AppConfig {
  const merged = {
    budget: { ...base.budget, ...overrides.budget },
    worker: { ...base.worker, ...overrides.worker },
    parallel: { ...base.parallel, ...overrides.parallel },
    safetyProbe: { ...base.safetyProbe, ...overrides.safetyProbe },
  };

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    throw invalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load configuration from a JSON file. A missing file yields the defaults.
 */
export async function loadConfig(path?: string): Promise<AppConfig> {
  if (!path) return resolveConfig();

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error: unknown) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return resolveConfig();
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw invalidConfigError(`${path} is not valid JSON`);
  }

  const parsed = overridesSchema.safeParse(json);
  if (!parsed.success) {
    throw invalidConfigError(`${path}: ${formatIssues(parsed.error)}`);
  }
  return resolveConfig(parsed.data);
}

/**
 * Units per worker used by the auto worker count
 */
export function targetUnitsPerWorker(config: AppConfig): number {
  return config.parallel.targetUnitsPerWorker ?? config.budget.checkpointThreshold;
}
