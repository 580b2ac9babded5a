import { Injectable } from '@nestjs/common';
import { DataSource, FindOptionsWhere, In } from 'typeorm';
import {
  JobExecutionRecord,
  JobLog,
  PipelineRun,
  StepResultRecord,
} from '../database/entities';
import type {
  JobExecution,
  LogLine,
  LogStream,
  OutcomeReason,
  Run,
  RunStatus,
  StepResult,
  StepStatus,
} from '../domain/run';
import type { TriggerEvent, TriggerEventType } from '../domain/trigger-event';
import { RunListFilter, RunStore } from './run-store';

const RUN_STATUSES: readonly RunStatus[] = ['queued', 'running', 'succeeded', 'failed', 'cancelled'];
const REASONS: readonly OutcomeReason[] = [
  'exit_code',
  'timeout',
  'cancelled',
  'superseded',
  'infrastructure_error',
  'upstream_failed',
  'interrupted',
];
const EVENT_TYPES: readonly TriggerEventType[] = ['push', 'pull_request', 'manual'];
const STREAMS: readonly LogStream[] = ['stdout', 'stderr', 'system'];
const DEFAULT_LIST_LIMIT = 100;

function pick<T extends string>(allowed: readonly T[], value: string | null, fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

function pickReason(value: string | null): OutcomeReason | undefined {
  return REASONS.find((r) => r === value);
}

function stepStatus(value: string): StepStatus {
  return value === 'succeeded' || value === 'cancelled' ? value : 'failed';
}

function optionalString(meta: Record<string, unknown>, key: string): string | undefined {
  const v = meta[key];
  return typeof v === 'string' ? v : undefined;
}

function toStepResult(row: StepResultRecord): StepResult {
  return {
    stepName: row.step_name,
    index: row.step_index,
    exitCode: row.exit_code,
    status: stepStatus(row.status),
    reason: pickReason(row.reason),
    outputRef: row.output_ref,
    outputTail: row.output_tail ?? [],
    startedAt: row.started_at,
    completedAt: row.completed_at,
    durationMs: row.duration_ms,
    attempts: row.attempts,
  };
}

function toJobExecution(row: JobExecutionRecord): JobExecution {
  return {
    id: row.id,
    runId: row.pipeline_run_id,
    jobKey: row.job_key,
    jobName: row.job_name,
    status: pick(RUN_STATUSES, row.status, 'failed'),
    reason: pickReason(row.reason),
    runnerId: row.runner_id ?? undefined,
    steps: (row.steps ?? []).map(toStepResult).sort((a, b) => a.index - b.index),
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
  };
}

function toRun(row: PipelineRun): Run {
  const meta = row.trigger_metadata ?? {};
  const prNumber = meta.pullRequestNumber;
  const receivedAt = optionalString(meta, 'receivedAt');
  const trigger: TriggerEvent = {
    repository: row.repository,
    branch: row.branch,
    commitSha: row.commit_sha,
    eventType: pick(EVENT_TYPES, row.event_type, 'manual'),
    pullRequestNumber: typeof prNumber === 'number' ? prNumber : undefined,
    baseBranch: optionalString(meta, 'baseBranch'),
    sender: optionalString(meta, 'sender'),
    message: optionalString(meta, 'message'),
    receivedAt: receivedAt ? new Date(receivedAt) : row.created_at,
  };
  const jobs = [...(row.jobs ?? [])].sort((a, b) => a.job_order - b.job_order);
  return {
    id: row.id,
    pipelineId: row.pipeline_id,
    pipelineName: row.pipeline_name,
    trigger,
    status: pick(RUN_STATUSES, row.status, 'failed'),
    reason: pickReason(row.reason),
    jobs: jobs.map(toJobExecution),
    createdAt: row.created_at,
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
  };
}

function triggerMetadata(trigger: TriggerEvent) {
  return {
    pullRequestNumber: trigger.pullRequestNumber,
    baseBranch: trigger.baseBranch,
    sender: trigger.sender,
    message: trigger.message,
    receivedAt: trigger.receivedAt.toISOString(),
  };
}

/**
 * PostgreSQL-backed run store (TypeORM repositories over the pipeline_runs,
 * job_executions, step_results and job_logs tables).
 */
@Injectable()
export class TypeOrmRunStore extends RunStore {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  async createRun(run: Run): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.insert(PipelineRun, {
        id: run.id,
        pipeline_id: run.pipelineId,
        pipeline_name: run.pipelineName,
        repository: run.trigger.repository,
        branch: run.trigger.branch,
        commit_sha: run.trigger.commitSha,
        event_type: run.trigger.eventType,
        trigger_metadata: triggerMetadata(run.trigger),
        status: run.status,
        reason: run.reason ?? null,
        created_at: run.createdAt,
      });
      if (run.jobs.length === 0) return;
      await manager.insert(
        JobExecutionRecord,
        run.jobs.map((job, order) => ({
          id: job.id,
          pipeline_run_id: run.id,
          job_key: job.jobKey,
          job_name: job.jobName,
          job_order: order,
          status: job.status,
          reason: job.reason ?? null,
        })),
      );
    });
  }

  async updateRun(run: Run): Promise<void> {
    await this.dataSource.getRepository(PipelineRun).update(run.id, {
      status: run.status,
      reason: run.reason ?? null,
      started_at: run.startedAt ?? null,
      completed_at: run.completedAt ?? null,
    });
  }

  async updateJob(job: JobExecution): Promise<void> {
    await this.dataSource.getRepository(JobExecutionRecord).update(job.id, {
      status: job.status,
      reason: job.reason ?? null,
      runner_id: job.runnerId ?? null,
      started_at: job.startedAt ?? null,
      completed_at: job.completedAt ?? null,
    });
  }

  async saveStepResult(jobExecutionId: string, step: StepResult): Promise<void> {
    await this.dataSource.getRepository(StepResultRecord).insert({
      job_execution_id: jobExecutionId,
      step_index: step.index,
      step_name: step.stepName,
      status: step.status,
      reason: step.reason ?? null,
      exit_code: step.exitCode,
      output_ref: step.outputRef,
      output_tail: step.outputTail,
      attempts: step.attempts,
      duration_ms: step.durationMs,
      started_at: step.startedAt,
      completed_at: step.completedAt,
    });
  }

  async appendLog(line: LogLine): Promise<void> {
    await this.dataSource.getRepository(JobLog).insert({
      job_execution_id: line.jobExecutionId,
      step_index: line.stepIndex,
      step_name: line.stepName,
      stream: line.stream,
      log_line: line.line,
      timestamp: line.timestamp,
    });
  }

  async findRun(runId: string): Promise<Run | null> {
    const row = await this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
      relations: ['jobs', 'jobs.steps'],
    });
    return row ? toRun(row) : null;
  }

  async listRuns(filter: RunListFilter): Promise<Run[]> {
    const where: FindOptionsWhere<PipelineRun> = {};
    if (filter.pipelineId) where.pipeline_id = filter.pipelineId;
    if (filter.repository) where.repository = filter.repository;
    if (filter.branch) where.branch = filter.branch;
    if (filter.status) where.status = filter.status;

    const rows = await this.dataSource.getRepository(PipelineRun).find({
      where,
      relations: ['jobs'],
      order: { created_at: 'DESC' },
      take: filter.limit ?? DEFAULT_LIST_LIMIT,
    });
    return rows.map(toRun);
  }

  async getJobLogs(jobExecutionId: string, stepIndex?: number): Promise<LogLine[]> {
    const job = await this.dataSource
      .getRepository(JobExecutionRecord)
      .findOne({ where: { id: jobExecutionId } });
    if (!job) return [];

    const where: FindOptionsWhere<JobLog> = { job_execution_id: jobExecutionId };
    if (stepIndex !== undefined) where.step_index = stepIndex;
    const rows = await this.dataSource.getRepository(JobLog).find({
      where,
      order: { step_index: 'ASC', id: 'ASC' },
    });

    return rows.map((row) => ({
      runId: job.pipeline_run_id,
      jobExecutionId,
      jobName: job.job_name,
      stepIndex: row.step_index,
      stepName: row.step_name,
      stream: pick(STREAMS, row.stream, 'stdout'),
      line: row.log_line,
      timestamp: row.timestamp,
    }));
  }

  async markInterrupted(): Promise<number> {
    return this.dataSource.transaction(async (manager) => {
      const live = In(['queued', 'running']);
      await manager.update(
        JobExecutionRecord,
        { status: live },
        { status: 'failed', reason: 'interrupted', completed_at: new Date() },
      );
      const result = await manager.update(
        PipelineRun,
        { status: live },
        { status: 'failed', reason: 'interrupted', completed_at: new Date() },
      );
      return result.affected ?? 0;
    });
  }
}
