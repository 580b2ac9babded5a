import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError, OrchestratorErrorCode, isOrchestratorError } from '../common/errors';
import { PipelinesService } from '../api/pipelines/pipelines.service';
import type { TriggerEvent } from '../domain/trigger-event';
import { SchedulerService } from '../scheduler/scheduler.service';

export interface SubmittedRun {
  pipelineId: string;
  pipelineName: string;
  runId: string;
}

export interface SkippedPipeline {
  pipelineId: string;
  pipelineName: string;
  code: OrchestratorErrorCode;
  reason: string;
}

export interface IntakeResult {
  runs: SubmittedRun[];
  skipped: SkippedPipeline[];
}

export interface ManualTrigger {
  pipelineId: string;
  branch: string;
  commitSha: string;
  sender?: string;
  message?: string;
}

/**
 * Event Intake: hands normalized events to the scheduler, one run per pipeline
 * registered for the repository.
 */
@Injectable()
export class IntakeService {
  private readonly logger = new Logger(IntakeService.name);

  constructor(
    private readonly pipelines: PipelinesService,
    private readonly scheduler: SchedulerService,
  ) {}

  /**
   * Submit the event to every pipeline of its repository. A pipeline that cannot take
   * the event (invalid definition, no matching trigger, full queue) is reported as skipped.
   * @throws NotFoundError when no pipeline is registered for the repository
   */
  async dispatch(event: TriggerEvent): Promise<IntakeResult> {
    const pipelines = await this.pipelines.findByRepository(event.repository);
    if (pipelines.length === 0) {
      throw new NotFoundError(`No pipeline registered for repository ${event.repository}`);
    }

    const result: IntakeResult = { runs: [], skipped: [] };
    for (const pipeline of pipelines) {
      const ref = { pipelineId: pipeline.id, pipelineName: pipeline.name };
      try {
        const runId = await this.scheduler.submit(event, pipeline.definition, {
          id: pipeline.id,
          name: pipeline.name,
        });
        result.runs.push({ ...ref, runId });
      } catch (err) {
        if (!isOrchestratorError(err)) throw err;
        this.logger.log(`Pipeline ${pipeline.name} skipped ${event.eventType} on ${event.branch}: ${err.message}`);
        result.skipped.push({ ...ref, code: err.code, reason: err.message });
      }
    }
    return result;
  }

  /**
   * Run one pipeline for a branch and commit on request.
   * @throws NotFoundError, or whatever SchedulerService.submit throws
   */
  async triggerManual(trigger: ManualTrigger): Promise<SubmittedRun> {
    const pipeline = await this.pipelines.findOne(trigger.pipelineId);
    const event: TriggerEvent = {
      repository: pipeline.repository,
      branch: trigger.branch,
      commitSha: trigger.commitSha,
      eventType: 'manual',
      sender: trigger.sender,
      message: trigger.message,
      receivedAt: new Date(),
    };
    const runId = await this.scheduler.submit(event, pipeline.definition, {
      id: pipeline.id,
      name: pipeline.name,
    });
    return { pipelineId: pipeline.id, pipelineName: pipeline.name, runId };
  }
}
