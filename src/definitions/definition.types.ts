import type { TriggerEventType } from '../domain/trigger-event';

/**
 * Branch filter compiled once at load time. `patterns` is kept for display and
 * persistence; `matches` is the compiled matcher.
 */
export interface BranchFilter {
  readonly patterns: readonly string[];
  matches(branch: string): boolean;
}

export interface StepDefinition {
  readonly name: string;
  readonly index: number;
  /** Shell command; may contain ${{ env.NAME }} expressions */
  readonly command: string;
  readonly env: Readonly<Record<string, string>>;
  readonly timeoutMs: number | null;
}

export interface JobDefinition {
  /** Key in the jobs map; unique within the pipeline */
  readonly key: string;
  readonly name: string;
  readonly steps: readonly StepDefinition[];
  readonly env: Readonly<Record<string, string>>;
  /** null means the job runs for every branch */
  readonly branches: BranchFilter | null;
  readonly needs: readonly string[];
  readonly timeoutMs: number | null;
}

/**
 * Pipeline-level trigger section. An event type absent from the map does not
 * trigger the pipeline; a present type with a null filter accepts every branch.
 */
export type PipelineTriggers = ReadonlyMap<TriggerEventType, BranchFilter | null>;

export interface PipelineDefinition {
  readonly name: string;
  /** null when the definition has no `on` section: every event triggers it */
  readonly on: PipelineTriggers | null;
  readonly env: Readonly<Record<string, string>>;
  /** Declaration order */
  readonly jobs: readonly JobDefinition[];
  /** sha256 of the canonical source, used to cache loads */
  readonly digest: string;
}
