import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import { errorMessage } from '../common/errors';
import type { JobExecution, LogLine, OutcomeReason, Run, RunStatus, StepResult } from '../domain/run';
import { RunStore } from '../store/run-store';
import { WebhookOutboxService } from './webhook-outbox.service';

export type StatusScope = 'run' | 'job' | 'step';

/** Published at every run, job and step transition. */
export interface StatusUpdate {
  runId: string;
  scope: StatusScope;
  status: RunStatus;
  timestamp: string;
  jobName?: string;
  stepName?: string;
  reason?: OutcomeReason;
}

export interface LogEvent {
  runId: string;
  jobExecutionId: string;
  jobName: string;
  stepName: string;
  stream: LogLine['stream'];
  line: string;
  timestamp: string;
}

/**
 * Status Reporter: fans out state transitions and output lines to in-process
 * subscribers (SSE), persists output lines, and queues run-level updates for the
 * external webhook when one is configured.
 */
@Injectable()
export class StatusReporterService implements OnModuleDestroy {
  private readonly logger = new Logger(StatusReporterService.name);
  private readonly statusSubject = new Subject<StatusUpdate>();
  private readonly logSubject = new Subject<LogEvent>();
  /** Per-job write chains so log rows land in emission order. */
  private readonly pendingWrites = new Map<string, Promise<void>>();

  constructor(
    @Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig,
    private readonly store: RunStore,
    private readonly outbox: WebhookOutboxService,
  ) {}

  onModuleDestroy(): void {
    this.statusSubject.complete();
    this.logSubject.complete();
  }

  runChanged(run: Run): void {
    this.publish({
      runId: run.id,
      scope: 'run',
      status: run.status,
      timestamp: new Date().toISOString(),
      reason: run.reason,
    });
    if (this.config.statusWebhookUrl) this.enqueueNotification(run, this.config.statusWebhookUrl);
  }

  jobChanged(job: JobExecution): void {
    this.publish({
      runId: job.runId,
      scope: 'job',
      status: job.status,
      timestamp: new Date().toISOString(),
      jobName: job.jobName,
      reason: job.reason,
    });
  }

  stepStarted(job: JobExecution, stepName: string): void {
    this.publish({
      runId: job.runId,
      scope: 'step',
      status: 'running',
      timestamp: new Date().toISOString(),
      jobName: job.jobName,
      stepName,
    });
  }

  stepFinished(job: JobExecution, step: StepResult): void {
    this.publish({
      runId: job.runId,
      scope: 'step',
      status: step.status,
      timestamp: step.completedAt.toISOString(),
      jobName: job.jobName,
      stepName: step.stepName,
      reason: step.reason,
    });
  }

  /** Stream one output line to subscribers immediately; persistence is queued behind earlier lines. */
  log(line: LogLine): void {
    this.logSubject.next({
      runId: line.runId,
      jobExecutionId: line.jobExecutionId,
      jobName: line.jobName,
      stepName: line.stepName,
      stream: line.stream,
      line: line.line,
      timestamp: line.timestamp.toISOString(),
    });

    const previous = this.pendingWrites.get(line.jobExecutionId) ?? Promise.resolve();
    const next = previous
      .then(() => this.store.appendLog(line))
      .catch((err: unknown) => {
        this.logger.warn(`Dropped log line for job ${line.jobExecutionId}: ${errorMessage(err)}`);
      });
    this.pendingWrites.set(line.jobExecutionId, next);
  }

  /** Wait until every queued log line of a job has been written. */
  async flushLogs(jobExecutionId: string): Promise<void> {
    const pending = this.pendingWrites.get(jobExecutionId);
    if (!pending) return;
    await pending;
    if (this.pendingWrites.get(jobExecutionId) === pending) this.pendingWrites.delete(jobExecutionId);
  }

  statusUpdates(): Observable<StatusUpdate> {
    return this.statusSubject.asObservable();
  }

  statusUpdatesForRun(runId: string): Observable<StatusUpdate> {
    return this.statusSubject.pipe(filter((u) => u.runId === runId));
  }

  logsForRun(runId: string): Observable<LogEvent> {
    return this.logSubject.pipe(filter((ev) => ev.runId === runId));
  }

  private publish(update: StatusUpdate): void {
    this.logger.debug(
      `run=${update.runId} ${update.scope}${update.jobName ? `:${update.jobName}` : ''}` +
        `${update.stepName ? `/${update.stepName}` : ''} -> ${update.status}`,
    );
    this.statusSubject.next(update);
  }

  private enqueueNotification(run: Run, url: string): void {
    const payload: Record<string, unknown> = {
      run_id: run.id,
      pipeline_id: run.pipelineId,
      pipeline: run.pipelineName,
      repository: run.trigger.repository,
      branch: run.trigger.branch,
      commit_sha: run.trigger.commitSha,
      status: run.status,
      reason: run.reason ?? null,
      timestamp: new Date().toISOString(),
    };
    this.outbox.enqueue(`run.${run.status}`, payload, url).catch((err: unknown) => {
      this.logger.error(`Could not queue notification for run ${run.id}: ${errorMessage(err)}`);
    });
  }
}
