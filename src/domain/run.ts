import type { TriggerEvent } from './trigger-event';

export type RunStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';
export type JobStatus = RunStatus;
export type StepStatus = 'succeeded' | 'failed' | 'cancelled';

export type OutcomeReason =
  | 'exit_code'
  | 'timeout'
  | 'cancelled'
  | 'superseded'
  | 'infrastructure_error'
  | 'upstream_failed'
  | 'interrupted';

const TERMINAL: ReadonlySet<RunStatus> = new Set(['succeeded', 'failed', 'cancelled']);

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL.has(status);
}

export interface StepResult {
  stepName: string;
  /** Position of the step in its job (0-based) */
  index: number;
  /** null when the process was killed by a signal or never started */
  exitCode: number | null;
  status: StepStatus;
  reason?: OutcomeReason;
  /** Where the full output lives: job-logs:<jobExecutionId>:<stepIndex> */
  outputRef: string;
  /** Last lines of combined stdout/stderr, kept for failure reports */
  outputTail: string[];
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  /** Launch attempts (more than one only after infrastructure errors) */
  attempts: number;
}

export interface JobExecution {
  id: string;
  runId: string;
  /** Key of the job in the definition's jobs map */
  jobKey: string;
  jobName: string;
  status: JobStatus;
  reason?: OutcomeReason;
  runnerId?: string;
  steps: StepResult[];
  startedAt?: Date;
  completedAt?: Date;
}

export interface Run {
  id: string;
  pipelineId: string | null;
  pipelineName: string;
  trigger: TriggerEvent;
  status: RunStatus;
  reason?: OutcomeReason;
  jobs: JobExecution[];
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export function outputRef(jobExecutionId: string, stepIndex: number): string {
  return `job-logs:${jobExecutionId}:${stepIndex}`;
}

/**
 * Job status from its step results: the first failing step decides, else succeeded.
 * Only meaningful once the executor stopped running steps.
 */
export function deriveJobStatus(steps: StepResult[]): { status: JobStatus; reason?: OutcomeReason } {
  const failing = steps.find((s) => s.status !== 'succeeded');
  if (!failing) return { status: 'succeeded' };
  return { status: failing.status, reason: failing.reason };
}

/**
 * Run status once every job is terminal. A cancelled run stays cancelled even when
 * some of its jobs had already failed.
 */
export function deriveRunStatus(jobs: JobExecution[], cancelled: boolean): RunStatus {
  if (cancelled) return 'cancelled';
  if (jobs.some((j) => j.status === 'failed')) return 'failed';
  if (jobs.every((j) => j.status === 'succeeded')) return 'succeeded';
  return 'failed';
}

export type LogStream = 'stdout' | 'stderr' | 'system';

/** One line of step output (or an orchestrator note about the step). */
export interface LogLine {
  runId: string;
  jobExecutionId: string;
  jobName: string;
  stepIndex: number;
  stepName: string;
  stream: LogStream;
  line: string;
  timestamp: Date;
}
