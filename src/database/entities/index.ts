/**
 * Database entities: pipelines, pipeline_runs, job_executions, step_results, job_logs, webhooks_outbox.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineRun } from './pipeline-run.entity';
export { JobExecutionRecord } from './job-execution.entity';
export { StepResultRecord } from './step-result.entity';
export { JobLog } from './job-log.entity';
export { WebhookOutbox } from './webhook-outbox.entity';

import { Pipeline } from './pipeline.entity';
import { PipelineRun } from './pipeline-run.entity';
import { JobExecutionRecord } from './job-execution.entity';
import { StepResultRecord } from './step-result.entity';
import { JobLog } from './job-log.entity';
import { WebhookOutbox } from './webhook-outbox.entity';

export const ENTITIES = [
  Pipeline,
  PipelineRun,
  JobExecutionRecord,
  StepResultRecord,
  JobLog,
  WebhookOutbox,
];
