import type { JobExecution, LogLine, Run, RunStatus, StepResult } from '../domain/run';

export interface RunListFilter {
  pipelineId?: string;
  repository?: string;
  branch?: string;
  status?: RunStatus;
  limit?: number;
}

/**
 * Persistence of runs and their output. The scheduler and executor keep the live
 * state in memory and mirror every transition here; reads serve the HTTP API.
 */
export abstract class RunStore {
  /** Insert a freshly admitted run together with its job executions. */
  abstract createRun(run: Run): Promise<void>;

  /** Persist status, reason and timestamps of the run (not its jobs). */
  abstract updateRun(run: Run): Promise<void>;

  abstract updateJob(job: JobExecution): Promise<void>;

  abstract saveStepResult(jobExecutionId: string, step: StepResult): Promise<void>;

  abstract appendLog(line: LogLine): Promise<void>;

  abstract findRun(runId: string): Promise<Run | null>;

  /** Newest first. */
  abstract listRuns(filter: RunListFilter): Promise<Run[]>;

  abstract getJobLogs(jobExecutionId: string, stepIndex?: number): Promise<LogLine[]>;

  /**
   * Fail runs and jobs left queued/running by a previous process (reason interrupted).
   * @returns number of runs affected
   */
  abstract markInterrupted(): Promise<number>;
}
