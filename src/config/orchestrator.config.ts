import { registerAs } from '@nestjs/config';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { MAX_TIMER_MS } from '../common/timers';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
const timerMs = positiveInt.max(MAX_TIMER_MS);

const envSchema = z.object({
  MAX_CONCURRENT_RUNS: positiveInt.default(4),
  PER_BRANCH_CONCURRENCY: positiveInt.default(1),
  PER_BRANCH_QUEUE_LIMIT: positiveInt.default(5),
  SUPERSEDE_ON_PUSH: booleanFlag.default('true'),
  RUNNER_POOL_SIZE: positiveInt.default(4),
  RUNNER_QUEUE_TIMEOUT_MS: timerMs.default(300_000),
  RUNNER_WORK_ROOT: z.string().min(1).default(join(tmpdir(), 'ci-orchestrator', 'runners')),
  DEFAULT_JOB_TIMEOUT_MS: timerMs.default(3_600_000),
  KILL_GRACE_MS: nonNegativeInt.max(MAX_TIMER_MS).default(5_000),
  INFRA_MAX_RETRIES: nonNegativeInt.default(2),
  INFRA_RETRY_BASE_MS: nonNegativeInt.default(1_000),
  OUTPUT_TAIL_LINES: positiveInt.default(50),
  STATUS_WEBHOOK_URL: z.string().url().optional(),
  RUN_NOTIFIER_LOOP: booleanFlag.default('true'),
});

export interface OrchestratorConfig {
  maxConcurrentRuns: number;
  perBranchConcurrency: number;
  perBranchQueueLimit: number;
  supersedeOnPush: boolean;
  runnerPoolSize: number;
  runnerQueueTimeoutMs: number;
  runnerWorkRoot: string;
  defaultJobTimeoutMs: number;
  killGraceMs: number;
  infraMaxRetries: number;
  infraRetryBaseMs: number;
  outputTailLines: number;
  statusWebhookUrl: string | null;
  runNotifierLoop: boolean;
}

/**
 * Parse orchestrator settings from an env-like record. Empty strings count as unset,
 * so `FOO=` in a .env file falls back to the default.
 */
export function parseOrchestratorConfig(env: Record<string, string | undefined>): OrchestratorConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid orchestrator configuration: ${details}`);
  }
  const e = result.data;
  return {
    maxConcurrentRuns: e.MAX_CONCURRENT_RUNS,
    perBranchConcurrency: e.PER_BRANCH_CONCURRENCY,
    perBranchQueueLimit: e.PER_BRANCH_QUEUE_LIMIT,
    supersedeOnPush: e.SUPERSEDE_ON_PUSH,
    runnerPoolSize: e.RUNNER_POOL_SIZE,
    runnerQueueTimeoutMs: e.RUNNER_QUEUE_TIMEOUT_MS,
    runnerWorkRoot: e.RUNNER_WORK_ROOT,
    defaultJobTimeoutMs: e.DEFAULT_JOB_TIMEOUT_MS,
    killGraceMs: e.KILL_GRACE_MS,
    infraMaxRetries: e.INFRA_MAX_RETRIES,
    infraRetryBaseMs: e.INFRA_RETRY_BASE_MS,
    outputTailLines: e.OUTPUT_TAIL_LINES,
    statusWebhookUrl: e.STATUS_WEBHOOK_URL ?? null,
    runNotifierLoop: e.RUN_NOTIFIER_LOOP,
  };
}

export const orchestratorConfig = registerAs('orchestrator', () =>
  parseOrchestratorConfig(process.env),
);
