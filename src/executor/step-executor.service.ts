import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import { InfrastructureError, errorMessage } from '../common/errors';
import type { JobDefinition, StepDefinition } from '../definitions/definition.types';
import {
  JobExecution,
  LogStream,
  OutcomeReason,
  StepResult,
  StepStatus,
  deriveJobStatus,
  outputRef,
} from '../domain/run';
import type { TriggerEvent } from '../domain/trigger-event';
import { StatusReporterService } from '../status/status-reporter.service';
import { RunStore } from '../store/run-store';
import { CommandOutcome, CommandRunner } from './command-runner';
import { AcquireAbortedError, Runner, RunnerLease, RunnerPool } from './runner-pool';
import { buildStepEnvironment, interpolateEnv } from './step-environment';

export interface ExecutionContext {
  runId: string;
  trigger: TriggerEvent;
  pipelineEnv: Readonly<Record<string, string>>;
}

type AcquireOutcome =
  | { kind: 'leased'; lease: RunnerLease; workspace: string }
  | { kind: 'cancelled' }
  | { kind: 'unavailable'; error: string };

type LaunchOutcome = { kind: 'finished'; outcome: CommandOutcome } | { kind: 'infrastructure_error' };

/** Resolves after ms, or as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

class OutputTail {
  private readonly lines: string[] = [];

  constructor(private readonly capacity: number) {}

  push(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.capacity) this.lines.shift();
  }

  snapshot(): string[] {
    return [...this.lines];
  }
}

/**
 * Step Executor: runs the steps of one job, in order, on a single runner checked out
 * from the pool. Stops at the first failing step; enforces the job's wall-clock
 * timeout and the run's cancellation; streams output as it is produced.
 */
@Injectable()
export class StepExecutorService {
  private readonly logger = new Logger(StepExecutorService.name);

  constructor(
    @Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig,
    private readonly pool: RunnerPool,
    private readonly commands: CommandRunner,
    private readonly reporter: StatusReporterService,
    private readonly store: RunStore,
  ) {}

  /**
   * Execute a job to a terminal status. Never throws for step failures, timeouts or
   * cancellation: those end up in job.status / job.reason.
   */
  async execute(
    job: JobExecution,
    definition: JobDefinition,
    context: ExecutionContext,
    signal: AbortSignal,
  ): Promise<JobExecution> {
    if (signal.aborted) return this.finish(job, 'cancelled', 'cancelled');

    const acquired = await this.acquireRunner(job, signal);
    if (acquired.kind === 'cancelled') return this.finish(job, 'cancelled', 'cancelled');
    if (acquired.kind === 'unavailable') {
      this.logger.error(`Job ${job.jobName} of run ${job.runId} got no runner: ${acquired.error}`);
      return this.finish(job, 'failed', 'infrastructure_error');
    }

    const { lease, workspace } = acquired;
    const jobAbort = new AbortController();
    const forwardAbort = () => jobAbort.abort();
    signal.addEventListener('abort', forwardAbort, { once: true });

    let timedOut = false;
    const timeoutMs = definition.timeoutMs ?? this.config.defaultJobTimeoutMs;
    const deadline = setTimeout(() => {
      timedOut = true;
      jobAbort.abort();
    }, timeoutMs);

    try {
      job.status = 'running';
      job.runnerId = lease.runner.id;
      job.startedAt = new Date();
      await this.persist(() => this.store.updateJob(job));
      this.reporter.jobChanged(job);

      for (const step of definition.steps) {
        // Cancellation and timeout are observed at every step boundary.
        if (jobAbort.signal.aborted) break;

        const result = await this.runStep(job, definition, step, context, workspace, {
          signal: jobAbort.signal,
          jobTimedOut: () => timedOut,
        });
        job.steps.push(result);
        await this.persist(() => this.store.saveStepResult(job.id, result));
        this.reporter.stepFinished(job, result);

        if (result.status !== 'succeeded') break;
      }

      const failing = job.steps.find((s) => s.status !== 'succeeded');
      if (failing) {
        const derived = deriveJobStatus(job.steps);
        return await this.finish(job, derived.status, derived.reason);
      }
      if (jobAbort.signal.aborted) {
        return await (timedOut
          ? this.finish(job, 'failed', 'timeout')
          : this.finish(job, 'cancelled', 'cancelled'));
      }
      return await this.finish(job, 'succeeded');
    } finally {
      clearTimeout(deadline);
      signal.removeEventListener('abort', forwardAbort);
      lease.release();
      await this.cleanWorkspace(workspace);
      await this.reporter.flushLogs(job.id);
    }
  }

  /** Check out a runner and prepare its workspace, retrying infrastructure errors with backoff. */
  private async acquireRunner(job: JobExecution, signal: AbortSignal): Promise<AcquireOutcome> {
    let lastError = '';
    for (let attempt = 0; attempt <= this.config.infraMaxRetries; attempt++) {
      if (attempt > 0) {
        await sleep(this.backoffMs(attempt - 1), signal);
        if (signal.aborted) return { kind: 'cancelled' };
      }

      let lease: RunnerLease | null = null;
      try {
        lease = await this.pool.acquire({ signal, timeoutMs: this.config.runnerQueueTimeoutMs });
        const workspace = await this.prepareWorkspace(lease.runner, job);
        return { kind: 'leased', lease, workspace };
      } catch (err) {
        lease?.release();
        if (err instanceof AcquireAbortedError || signal.aborted) return { kind: 'cancelled' };
        if (!(err instanceof InfrastructureError)) throw err;
        lastError = err.message;
        this.logger.warn(
          `Runner for ${job.jobName} (run ${job.runId}) attempt ${attempt + 1} failed: ${err.message}`,
        );
      }
    }
    return { kind: 'unavailable', error: lastError };
  }

  private async prepareWorkspace(runner: Runner, job: JobExecution): Promise<string> {
    const workspace = join(runner.workDir, job.id);
    try {
      await mkdir(workspace, { recursive: true });
    } catch (err) {
      throw new InfrastructureError(
        `Could not prepare workspace ${workspace} on ${runner.id}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    return workspace;
  }

  private async cleanWorkspace(workspace: string): Promise<void> {
    try {
      await rm(workspace, { recursive: true, force: true });
    } catch (err) {
      this.logger.warn(`Could not remove workspace ${workspace}: ${errorMessage(err)}`);
    }
  }

  private async runStep(
    job: JobExecution,
    definition: JobDefinition,
    step: StepDefinition,
    context: ExecutionContext,
    workspace: string,
    limits: { signal: AbortSignal; jobTimedOut: () => boolean },
  ): Promise<StepResult> {
    const startedAt = new Date();
    const tail = new OutputTail(this.config.outputTailLines);
    const emit = (stream: LogStream, line: string) => {
      if (stream !== 'system') tail.push(line);
      this.reporter.log({
        runId: job.runId,
        jobExecutionId: job.id,
        jobName: job.jobName,
        stepIndex: step.index,
        stepName: step.name,
        stream,
        line,
        timestamp: new Date(),
      });
    };

    const stepAbort = new AbortController();
    const forwardAbort = () => stepAbort.abort();
    limits.signal.addEventListener('abort', forwardAbort, { once: true });
    if (limits.signal.aborted) stepAbort.abort();

    let stepTimedOut = false;
    const stepDeadline =
      step.timeoutMs === null
        ? null
        : setTimeout(() => {
            stepTimedOut = true;
            stepAbort.abort();
          }, step.timeoutMs);

    const env = buildStepEnvironment({
      runId: context.runId,
      trigger: context.trigger,
      pipelineEnv: context.pipelineEnv,
      job: definition,
      step,
      workspace,
    });
    const command = interpolateEnv(step.command, env);

    this.reporter.stepStarted(job, step.name);
    emit('system', `$ ${command}`);

    let attempts = 0;
    let launched: LaunchOutcome;
    try {
      launched = await this.launch(command, workspace, env, stepAbort.signal, emit, () => ++attempts);
    } finally {
      if (stepDeadline) clearTimeout(stepDeadline);
      limits.signal.removeEventListener('abort', forwardAbort);
    }

    let exitCode: number | null = null;
    let status: StepStatus;
    let reason: OutcomeReason | undefined;

    if (launched.kind === 'infrastructure_error') {
      status = 'failed';
      reason = stepAbort.signal.aborted ? this.abortReason(stepTimedOut, limits) : 'infrastructure_error';
      if (reason === 'cancelled') status = 'cancelled';
    } else {
      exitCode = launched.outcome.exitCode;
      if (exitCode === 0) {
        status = 'succeeded';
      } else if (stepAbort.signal.aborted) {
        reason = this.abortReason(stepTimedOut, limits);
        status = reason === 'cancelled' ? 'cancelled' : 'failed';
      } else {
        status = 'failed';
        reason = 'exit_code';
      }
    }

    if (reason === 'timeout') emit('system', 'Step terminated: timeout exceeded');
    else if (reason === 'cancelled') emit('system', 'Step terminated: run cancelled');
    else if (reason === 'exit_code') emit('system', `Process exited with code ${exitCode}`);

    const completedAt = new Date();
    return {
      stepName: step.name,
      index: step.index,
      exitCode,
      status,
      reason,
      outputRef: outputRef(job.id, step.index),
      outputTail: tail.snapshot(),
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      attempts,
    };
  }

  /**
   * Start the step process. Only spawn failures are retried: the command never ran,
   * so retrying it has no side effects. A non-zero exit is final.
   */
  private async launch(
    command: string,
    cwd: string,
    env: Record<string, string>,
    signal: AbortSignal,
    emit: (stream: LogStream, line: string) => void,
    countAttempt: () => number,
  ): Promise<LaunchOutcome> {
    for (;;) {
      const attempt = countAttempt();
      try {
        const outcome = await this.commands.run(
          { command, cwd, env },
          { onStdout: (line) => emit('stdout', line), onStderr: (line) => emit('stderr', line) },
          signal,
        );
        return { kind: 'finished', outcome };
      } catch (err) {
        if (!(err instanceof InfrastructureError)) throw err;
        if (attempt > this.config.infraMaxRetries || signal.aborted) {
          emit('system', `Infrastructure error: ${err.message}`);
          return { kind: 'infrastructure_error' };
        }
        const delay = this.backoffMs(attempt - 1);
        emit('system', `Infrastructure error: ${err.message}; retrying in ${delay}ms`);
        await sleep(delay, signal);
        if (signal.aborted) return { kind: 'infrastructure_error' };
      }
    }
  }

  private abortReason(
    stepTimedOut: boolean,
    limits: { jobTimedOut: () => boolean },
  ): OutcomeReason {
    return stepTimedOut || limits.jobTimedOut() ? 'timeout' : 'cancelled';
  }

  private backoffMs(retry: number): number {
    return this.config.infraRetryBaseMs * 2 ** retry;
  }

  private async finish(
    job: JobExecution,
    status: JobExecution['status'],
    reason?: OutcomeReason,
  ): Promise<JobExecution> {
    job.status = status;
    job.reason = reason;
    job.completedAt = new Date();
    await this.persist(() => this.store.updateJob(job));
    this.reporter.jobChanged(job);
    return job;
  }

  /** Persistence mirrors live state; a failed write is logged and execution goes on. */
  private async persist(write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      this.logger.error(`Persisting job state failed: ${errorMessage(err)}`);
    }
  }
}
