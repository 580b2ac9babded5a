import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import {
  ConcurrencyExceededError,
  InfrastructureError,
  TriggerNotMatchedError,
  errorMessage,
} from '../common/errors';
import { DefinitionStoreService } from '../definitions/definition-store.service';
import type { JobDefinition, PipelineDefinition } from '../definitions/definition.types';
import {
  JobExecution,
  OutcomeReason,
  Run,
  deriveRunStatus,
  isTerminal,
} from '../domain/run';
import { TriggerEvent, branchKey, isSameEvent } from '../domain/trigger-event';
import { RunnerPool, RunnerPoolStats } from '../executor/runner-pool';
import { StepExecutorService } from '../executor/step-executor.service';
import { StatusReporterService } from '../status/status-reporter.service';
import { RunStore } from '../store/run-store';

const SHUTDOWN_GRACE_MS = 10_000;

export interface PipelineRef {
  id: string | null;
  name?: string;
}

type CancelReason = Extract<OutcomeReason, 'cancelled' | 'superseded'>;

interface JobSlot {
  execution: JobExecution;
  definition: JobDefinition;
  /** Only edges to admitted jobs */
  needs: string[];
  launched: boolean;
}

interface RunEntry {
  run: Run;
  definition: PipelineDefinition;
  branchKey: string;
  jobs: Map<string, JobSlot>;
  abort: AbortController;
  cancelReason: CancelReason | null;
  /** Creation persisted; only then may the run start */
  ready: boolean;
  /** Serializes this run's store writes behind its creation */
  writes: Promise<void>;
  settled: Promise<Run>;
  resolveSettled: (run: Run) => void;
}

export interface SchedulerSnapshot {
  queued: Array<{ runId: string; branchKey: string; pipeline: string; createdAt: string }>;
  running: Array<{ runId: string; branchKey: string; pipeline: string; startedAt: string | null }>;
  limits: { maxConcurrentRuns: number; perBranchConcurrency: number; perBranchQueueLimit: number };
  runners: RunnerPoolStats;
}

/**
 * Scheduler: admits runs, enforces the global and per-branch limits, supersedes older
 * runs of a branch on push, and drives each run's job DAG through the step executor.
 *
 * Live runs are held in memory; every transition is mirrored to the run store.
 */
@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  /** Non-terminal runs by id */
  private readonly active = new Map<string, RunEntry>();
  /** Queued runs, oldest first */
  private readonly queue: RunEntry[] = [];
  private readonly running = new Set<RunEntry>();

  constructor(
    @Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig,
    private readonly definitions: DefinitionStoreService,
    private readonly executor: StepExecutorService,
    private readonly reporter: StatusReporterService,
    private readonly store: RunStore,
    private readonly pool: RunnerPool,
  ) {}

  async onModuleInit(): Promise<void> {
    const interrupted = await this.store.markInterrupted();
    if (interrupted > 0) {
      this.logger.warn(`Marked ${interrupted} run(s) left over by a previous process as interrupted`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    const pending = [...this.active.values()];
    for (const entry of pending) this.cancel(entry.run.id);
    if (pending.length === 0) return;
    let grace: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        Promise.all(pending.map((e) => e.settled)),
        new Promise<void>((resolve) => {
          grace = setTimeout(resolve, SHUTDOWN_GRACE_MS);
        }),
      ]);
    } finally {
      clearTimeout(grace);
    }
  }

  /**
   * Admit a run for a trigger event.
   * @param source definition text/object, or a definition already loaded by the store
   * @throws DefinitionInvalidError when the definition does not load
   * @throws TriggerNotMatchedError when no job of the pipeline applies to the event
   * @throws ConcurrencyExceededError when the branch queue is full (retry later)
   * @throws InfrastructureError when the run could not be recorded
   */
  async submit(trigger: TriggerEvent, source: unknown, pipeline?: PipelineRef): Promise<string> {
    const definition = this.definitions.isLoaded(source)
      ? source
      : this.definitions.loadCached(source);
    const admitted = this.admitJobs(definition, trigger);
    const key = branchKey(trigger);

    // Runs other pipelines already admitted for this same push are siblings, not older runs
    if (this.config.supersedeOnPush && trigger.eventType === 'push') {
      for (const entry of [...this.active.values()]) {
        if (entry.branchKey === key && !isSameEvent(entry.run.trigger, trigger)) {
          this.cancel(entry.run.id, 'superseded');
        }
      }
    }

    const queuedOnBranch = this.queue.filter((e) => e.branchKey === key).length;
    if (queuedOnBranch >= this.config.perBranchQueueLimit) {
      throw new ConcurrencyExceededError(key, this.config.perBranchQueueLimit);
    }

    const entry = this.createEntry(trigger, definition, admitted, pipeline);
    const { run } = entry;
    this.active.set(run.id, entry);
    this.queue.push(entry);
    this.reporter.runChanged(run);
    this.logger.log(
      `Queued run ${run.id} (${run.pipelineName}) for ${key}@${trigger.commitSha.slice(0, 12)}`,
    );

    const created = this.store.createRun(run);
    entry.writes = created.catch(() => undefined);
    try {
      await created;
    } catch (err) {
      this.drop(entry);
      throw new InfrastructureError(`Could not record run: ${errorMessage(err)}`, { cause: err });
    }

    entry.ready = true;
    this.pump();
    return run.id;
  }

  /**
   * Cancel a queued or running run. Jobs that have not started are cancelled at once;
   * in-flight jobs are terminated by the executor and the run turns terminal after them.
   * @returns false if the run is unknown or already terminal
   */
  cancel(runId: string, reason: CancelReason = 'cancelled'): boolean {
    const entry = this.active.get(runId);
    if (!entry || isTerminal(entry.run.status)) return false;
    if (entry.cancelReason) return true;

    entry.cancelReason = reason;
    this.logger.log(`Cancelling run ${runId} (${reason})`);
    entry.abort.abort();

    if (entry.run.status === 'queued') {
      const index = this.queue.indexOf(entry);
      if (index >= 0) this.queue.splice(index, 1);
    }
    this.advance(entry);
    return true;
  }

  /** Live state of an active run, if any. */
  getActive(runId: string): Run | undefined {
    return this.active.get(runId)?.run;
  }

  /** Resolves with the run once it is terminal (immediately from the store if it already is). */
  async settled(runId: string): Promise<Run | null> {
    const entry = this.active.get(runId);
    if (entry) return entry.settled;
    return this.store.findRun(runId);
  }

  snapshot(): SchedulerSnapshot {
    return {
      queued: this.queue.map((e) => ({
        runId: e.run.id,
        branchKey: e.branchKey,
        pipeline: e.run.pipelineName,
        createdAt: e.run.createdAt.toISOString(),
      })),
      running: [...this.running].map((e) => ({
        runId: e.run.id,
        branchKey: e.branchKey,
        pipeline: e.run.pipelineName,
        startedAt: e.run.startedAt?.toISOString() ?? null,
      })),
      limits: {
        maxConcurrentRuns: this.config.maxConcurrentRuns,
        perBranchConcurrency: this.config.perBranchConcurrency,
        perBranchQueueLimit: this.config.perBranchQueueLimit,
      },
      runners: this.pool.stats(),
    };
  }

  /**
   * Jobs of the definition that apply to the event, in declaration order.
   * Pull request events match the pipeline's branch filter against the target branch;
   * job filters always match the event branch. Manual triggers bypass the `on` section.
   */
  private admitJobs(definition: PipelineDefinition, trigger: TriggerEvent): JobDefinition[] {
    if (definition.on && trigger.eventType !== 'manual') {
      if (!definition.on.has(trigger.eventType)) {
        throw new TriggerNotMatchedError(
          `Pipeline "${definition.name}" is not triggered by ${trigger.eventType} events`,
        );
      }
      const filter = definition.on.get(trigger.eventType);
      const branch =
        trigger.eventType === 'pull_request' ? trigger.baseBranch ?? trigger.branch : trigger.branch;
      if (filter && !filter.matches(branch)) {
        throw new TriggerNotMatchedError(
          `Pipeline "${definition.name}" does not run ${trigger.eventType} events for branch ${branch}`,
        );
      }
    }

    const jobs = definition.jobs.filter((job) => !job.branches || job.branches.matches(trigger.branch));
    if (jobs.length === 0) {
      throw new TriggerNotMatchedError(
        `No job of pipeline "${definition.name}" runs for branch ${trigger.branch}`,
      );
    }
    return jobs;
  }

  private createEntry(
    trigger: TriggerEvent,
    definition: PipelineDefinition,
    admitted: JobDefinition[],
    pipeline?: PipelineRef,
  ): RunEntry {
    const runId = randomUUID();
    const keys = new Set(admitted.map((j) => j.key));
    const jobs = new Map<string, JobSlot>();
    for (const job of admitted) {
      jobs.set(job.key, {
        execution: {
          id: randomUUID(),
          runId,
          jobKey: job.key,
          jobName: job.name,
          status: 'queued',
          steps: [],
        },
        definition: job,
        needs: job.needs.filter((n) => keys.has(n)),
        launched: false,
      });
    }

    const run: Run = {
      id: runId,
      pipelineId: pipeline?.id ?? null,
      pipelineName: pipeline?.name ?? definition.name,
      trigger,
      status: 'queued',
      jobs: [...jobs.values()].map((slot) => slot.execution),
      createdAt: new Date(),
    };

    let resolveSettled: (run: Run) => void = () => undefined;
    const settled = new Promise<Run>((resolve) => {
      resolveSettled = resolve;
    });

    return {
      run,
      definition,
      branchKey: branchKey(trigger),
      jobs,
      abort: new AbortController(),
      cancelReason: null,
      ready: false,
      writes: Promise.resolve(),
      settled,
      resolveSettled,
    };
  }

  /** Admit queued runs oldest-first while global and per-branch capacity allows. */
  private pump(): void {
    let index = 0;
    while (index < this.queue.length && this.running.size < this.config.maxConcurrentRuns) {
      const entry = this.queue[index];
      if (!entry.ready || this.runningOnBranch(entry.branchKey) >= this.config.perBranchConcurrency) {
        index++;
        continue;
      }
      this.queue.splice(index, 1);
      this.start(entry);
    }
  }

  private runningOnBranch(key: string): number {
    let count = 0;
    for (const entry of this.running) if (entry.branchKey === key) count++;
    return count;
  }

  private start(entry: RunEntry): void {
    const { run } = entry;
    run.status = 'running';
    run.startedAt = new Date();
    this.running.add(entry);
    this.write(entry, () => this.store.updateRun(run));
    this.reporter.runChanged(run);
    this.logger.log(`Started run ${run.id} with ${entry.jobs.size} job(s)`);
    this.advance(entry);
  }

  /**
   * Move the run's DAG forward: cancel jobs that can no longer run, launch jobs whose
   * dependencies succeeded, and finish the run once every job is terminal.
   */
  private advance(entry: RunEntry): void {
    const startable = entry.run.status === 'running' && !entry.cancelReason;

    let changed = true;
    while (changed) {
      changed = false;
      for (const slot of entry.jobs.values()) {
        if (slot.launched || slot.execution.status !== 'queued') continue;

        if (entry.cancelReason) {
          this.skipJob(entry, slot, entry.cancelReason);
          changed = true;
          continue;
        }
        const upstream = slot.needs.map((key) => entry.jobs.get(key)?.execution.status);
        if (upstream.some((s) => s === 'failed' || s === 'cancelled')) {
          this.skipJob(entry, slot, 'upstream_failed');
          changed = true;
        } else if (startable && upstream.every((s) => s === 'succeeded')) {
          this.launch(entry, slot);
        }
      }
    }

    if ([...entry.jobs.values()].every((slot) => isTerminal(slot.execution.status))) {
      this.finish(entry);
    }
  }

  private skipJob(entry: RunEntry, slot: JobSlot, reason: OutcomeReason): void {
    const job = slot.execution;
    job.status = 'cancelled';
    job.reason = reason;
    job.completedAt = new Date();
    this.write(entry, () => this.store.updateJob(job));
    this.reporter.jobChanged(job);
  }

  private launch(entry: RunEntry, slot: JobSlot): void {
    slot.launched = true;
    const job = slot.execution;
    const context = {
      runId: entry.run.id,
      trigger: entry.run.trigger,
      pipelineEnv: entry.definition.env,
    };

    this.executor
      .execute(job, slot.definition, context, entry.abort.signal)
      .catch((err: unknown) => {
        this.logger.error(`Job ${job.jobName} of run ${job.runId} crashed: ${errorMessage(err)}`);
        if (!isTerminal(job.status)) {
          job.status = 'failed';
          job.reason = 'infrastructure_error';
          job.completedAt = new Date();
          this.write(entry, () => this.store.updateJob(job));
          this.reporter.jobChanged(job);
        }
      })
      .finally(() => this.advance(entry));
  }

  private finish(entry: RunEntry): void {
    const { run } = entry;
    if (isTerminal(run.status)) return;

    run.status = deriveRunStatus(run.jobs, entry.cancelReason !== null);
    run.reason =
      entry.cancelReason ?? run.jobs.find((j) => j.status === 'failed')?.reason ?? undefined;
    run.completedAt = new Date();

    this.running.delete(entry);
    this.active.delete(run.id);
    this.write(entry, () => this.store.updateRun(run));
    this.reporter.runChanged(run);
    this.logger.log(`Run ${run.id} ${run.status}${run.reason ? ` (${run.reason})` : ''}`);

    // settled() callers see the final state already persisted
    void entry.writes.then(() => entry.resolveSettled(run));
    this.pump();
  }

  /** Remove a run whose creation could not be persisted. */
  private drop(entry: RunEntry): void {
    this.active.delete(entry.run.id);
    const index = this.queue.indexOf(entry);
    if (index >= 0) this.queue.splice(index, 1);
  }

  private write(entry: RunEntry, op: () => Promise<void>): void {
    entry.writes = entry.writes.then(op).catch((err: unknown) => {
      this.logger.error(`Persisting run ${entry.run.id} failed: ${errorMessage(err)}`);
    });
  }
}
