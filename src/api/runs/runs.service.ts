import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { NotFoundError } from '../../common/errors';
import type { LogLine, Run } from '../../domain/run';
import { IntakeService, SubmittedRun } from '../../intake/intake.service';
import { SchedulerService, SchedulerSnapshot } from '../../scheduler/scheduler.service';
import { RunStore } from '../../store/run-store';

export const runQuerySchema = z.object({
  pipelineId: z.string().uuid().optional(),
  repository: z.string().min(1).optional(),
  branch: z.string().min(1).optional(),
  status: z.enum(['queued', 'running', 'succeeded', 'failed', 'cancelled']).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const triggerRunSchema = z.object({
  pipelineId: z.string().uuid(),
  branch: z.string().min(1),
  commitSha: z.string().min(1),
  sender: z.string().optional(),
  message: z.string().optional(),
});

export type RunQuery = z.infer<typeof runQuerySchema>;
export type TriggerRunInput = z.infer<typeof triggerRunSchema>;

export interface CancelResult {
  runId: string;
  /** false when the run had already finished */
  cancelled: boolean;
  status: Run['status'];
}

/**
 * Read side of runs (live state first, then the store) plus manual trigger and cancel.
 */
@Injectable()
export class RunsService {
  private readonly logger = new Logger(RunsService.name);

  constructor(
    private readonly store: RunStore,
    private readonly scheduler: SchedulerService,
    private readonly intake: IntakeService,
  ) {}

  async findAll(query: RunQuery): Promise<Run[]> {
    const runs = await this.store.listRuns(query);
    return runs.map((run) => this.scheduler.getActive(run.id) ?? run);
  }

  queue(): SchedulerSnapshot {
    return this.scheduler.snapshot();
  }

  /** @throws NotFoundError */
  async findOne(runId: string): Promise<Run> {
    const run = this.scheduler.getActive(runId) ?? (await this.store.findRun(runId));
    if (!run) throw new NotFoundError(`Run ${runId} not found`);
    return run;
  }

  /** Output of one job, optionally of a single step, in emission order. */
  async getJobLogs(runId: string, jobId: string, stepIndex?: number): Promise<LogLine[]> {
    const run = await this.findOne(runId);
    if (!run.jobs.some((job) => job.id === jobId)) {
      throw new NotFoundError(`Job ${jobId} is not part of run ${runId}`);
    }
    return this.store.getJobLogs(jobId, stepIndex);
  }

  async trigger(input: TriggerRunInput): Promise<SubmittedRun> {
    return this.intake.triggerManual(input);
  }

  async cancel(runId: string): Promise<CancelResult> {
    if (this.scheduler.cancel(runId)) {
      this.logger.log(`Run ${runId} cancelled on request`);
      const live = this.scheduler.getActive(runId);
      return { runId, cancelled: true, status: live?.status ?? 'cancelled' };
    }
    const run = await this.findOne(runId);
    return { runId, cancelled: false, status: run.status };
  }
}
