import type { JobDefinition, StepDefinition } from '../definitions/definition.types';
import type { TriggerEvent } from '../domain/trigger-event';

const ENV_EXPRESSION = /\$\{\{\s*env\.([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export interface StepEnvironmentInput {
  runId: string;
  trigger: TriggerEvent;
  pipelineEnv: Readonly<Record<string, string>>;
  job: JobDefinition;
  step: StepDefinition;
  workspace: string;
}

/**
 * Environment of a step: pipeline env, overridden by job env, overridden by step env,
 * then the CI_* variables (which definitions cannot override).
 */
export function buildStepEnvironment(input: StepEnvironmentInput): Record<string, string> {
  const { trigger } = input;
  const env: Record<string, string> = {
    ...input.pipelineEnv,
    ...input.job.env,
    ...input.step.env,
    CI: 'true',
    CI_RUN_ID: input.runId,
    CI_JOB: input.job.key,
    CI_STEP: input.step.name,
    CI_REPOSITORY: trigger.repository,
    CI_BRANCH: trigger.branch,
    CI_COMMIT_SHA: trigger.commitSha,
    CI_EVENT: trigger.eventType,
    CI_WORKSPACE: input.workspace,
  };
  if (trigger.pullRequestNumber !== undefined) {
    env.CI_PULL_REQUEST = String(trigger.pullRequestNumber);
  }
  if (trigger.baseBranch) env.CI_BASE_BRANCH = trigger.baseBranch;
  return env;
}

/** Substitute ${{ env.NAME }} expressions; unknown names become empty strings. */
export function interpolateEnv(command: string, env: Readonly<Record<string, string>>): string {
  return command.replace(ENV_EXPRESSION, (_match, name: string) =>
    Object.hasOwn(env, name) ? env[name] : '',
  );
}
