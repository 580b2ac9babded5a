import { Injectable, Logger } from '@nestjs/common';
import { createHash } from 'node:crypto';
import YAML from 'yaml';
import { DefinitionIssue, ParseError, ValidationError } from '../common/errors';
import { MAX_TIMER_MS } from '../common/timers';
import type { TriggerEventType } from '../domain/trigger-event';
import { compileBranchFilter } from './branch-matcher';
import { RawBranchesFilter, RawDefinition, RawJob, rawDefinitionSchema } from './definition.schema';
import type {
  BranchFilter,
  JobDefinition,
  PipelineDefinition,
  PipelineTriggers,
  StepDefinition,
} from './definition.types';

const EVENT_TYPES: readonly TriggerEventType[] = ['push', 'pull_request', 'manual'];
const MAX_CACHED_DEFINITIONS = 256;
const MINUTE_MS = 60_000;

function digestOf(raw: unknown): string {
  const source = typeof raw === 'string' ? raw : JSON.stringify(raw);
  return createHash('sha256').update(source).digest('hex');
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function defaultStepName(command: string | undefined, index: number): string {
  const firstLine = command?.split('\n').find((l) => l.trim().length > 0)?.trim();
  if (!firstLine) return `step-${index + 1}`;
  return firstLine.length > 60 ? `Run ${firstLine.slice(0, 57)}...` : `Run ${firstLine}`;
}

const MAX_TIMEOUT_MINUTES = Math.floor(MAX_TIMER_MS / MINUTE_MS);

function toTimeoutMs(minutes: number | undefined): number | null {
  return minutes === undefined ? null : Math.round(minutes * MINUTE_MS);
}

function checkTimeout(minutes: number | undefined, path: string, issues: DefinitionIssue[]): void {
  if (minutes === undefined) return;
  if (minutes <= 0) {
    issues.push({ path, message: 'must be positive' });
  } else if (!(minutes <= MAX_TIMEOUT_MINUTES)) {
    issues.push({ path, message: `must be at most ${MAX_TIMEOUT_MINUTES} minutes` });
  }
}

/**
 * Pipeline Definition Store: parses declarative pipeline text into an immutable DAG of jobs.
 * Validation happens here once; the scheduler never re-checks a loaded definition.
 */
@Injectable()
export class DefinitionStoreService {
  private readonly logger = new Logger(DefinitionStoreService.name);
  private readonly cache = new Map<string, PipelineDefinition>();
  private readonly loaded = new WeakSet<object>();

  /**
   * Load a definition from YAML/JSON text or an already-parsed object (e.g. a jsonb column).
   * @throws ParseError on malformed text or structure
   * @throws ValidationError on semantic problems (no jobs, empty job, unknown step type, ...)
   */
  load(raw: unknown): PipelineDefinition {
    const source = this.parseSource(raw);
    const structured = rawDefinitionSchema.safeParse(source);
    if (!structured.success) {
      const issues = structured.error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      }));
      throw new ParseError(
        `Malformed pipeline definition: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
        issues,
      );
    }
    const definition = deepFreeze(this.build(structured.data, digestOf(raw)));
    this.loaded.add(definition);
    return definition;
  }

  /** Whether the value is a definition this store loaded (and therefore validated). */
  isLoaded(value: unknown): value is PipelineDefinition {
    return typeof value === 'object' && value !== null && this.loaded.has(value);
  }

  /** Same as load(), memoized by content digest so stored pipelines are validated once. */
  loadCached(raw: unknown): PipelineDefinition {
    const digest = digestOf(raw);
    const hit = this.cache.get(digest);
    if (hit) return hit;

    const definition = this.load(raw);
    if (this.cache.size >= MAX_CACHED_DEFINITIONS) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(digest, definition);
    this.logger.debug(`Loaded definition "${definition.name}" (${digest.slice(0, 12)})`);
    return definition;
  }

  private parseSource(raw: unknown): unknown {
    if (typeof raw !== 'string') {
      if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
        throw new ParseError('Pipeline definition must be a mapping');
      }
      return raw;
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ParseError(`Pipeline definition is not valid YAML: ${message}`);
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ParseError('Pipeline definition must be a mapping');
    }
    return parsed;
  }

  private build(raw: RawDefinition, digest: string): PipelineDefinition {
    const issues: DefinitionIssue[] = [];
    const jobEntries = Object.entries(raw.jobs);

    if (jobEntries.length === 0) {
      issues.push({ path: 'jobs', message: 'pipeline must declare at least one job' });
    }

    const on = raw.on === undefined ? null : this.buildTriggers(raw.on, issues);
    const jobs = jobEntries.map(([key, job]) => this.buildJob(key, job, issues));

    const keys = new Set(jobs.map((j) => j.key));
    for (const job of jobs) {
      for (const need of job.needs) {
        if (need === job.key) {
          issues.push({ path: `jobs.${job.key}.needs`, message: 'job cannot depend on itself' });
        } else if (!keys.has(need)) {
          issues.push({ path: `jobs.${job.key}.needs`, message: `unknown job "${need}"` });
        }
      }
    }
    const cycle = issues.length === 0 ? findCycle(jobs) : null;
    if (cycle) {
      issues.push({ path: 'jobs', message: `dependency cycle: ${cycle.join(' -> ')}` });
    }

    if (issues.length > 0) throw ValidationError.fromIssues(issues);

    return { name: raw.name ?? 'pipeline', on, env: raw.env, jobs, digest };
  }

  private buildTriggers(
    raw: Record<string, RawBranchesFilter>,
    issues: DefinitionIssue[],
  ): PipelineTriggers {
    const triggers = new Map<TriggerEventType, BranchFilter | null>();
    for (const [event, filter] of Object.entries(raw)) {
      const type = EVENT_TYPES.find((t) => t === event);
      if (!type) {
        issues.push({ path: `on.${event}`, message: `unsupported event type "${event}"` });
        continue;
      }
      const patterns = [
        ...(filter?.branches ?? []),
        ...(filter?.['branches-ignore'] ?? []).map((p) => `!${p}`),
      ];
      triggers.set(type, this.compilePatterns(patterns, `on.${event}.branches`, issues));
    }
    return triggers;
  }

  private buildJob(key: string, raw: RawJob, issues: DefinitionIssue[]): JobDefinition {
    const path = `jobs.${key}`;
    if (raw.steps.length === 0) {
      issues.push({ path: `${path}.steps`, message: 'job must declare at least one step' });
    }
    checkTimeout(raw['timeout-minutes'], `${path}.timeout-minutes`, issues);

    const seenNames = new Set<string>();
    const steps: StepDefinition[] = raw.steps.map((step, index) => {
      const stepPath = `${path}.steps.${index}`;
      if (step.uses !== undefined) {
        issues.push({
          path: `${stepPath}.uses`,
          message: `unsupported step type "uses: ${step.uses}"; only run steps are supported`,
        });
      } else if (step.run === undefined || step.run.trim() === '') {
        issues.push({ path: `${stepPath}.run`, message: 'step must declare a command' });
      }
      checkTimeout(step['timeout-minutes'], `${stepPath}.timeout-minutes`, issues);
      if (step.name !== undefined) {
        if (seenNames.has(step.name)) {
          issues.push({ path: `${stepPath}.name`, message: `duplicate step name "${step.name}"` });
        }
        seenNames.add(step.name);
      }
      return {
        name: step.name ?? defaultStepName(step.run, index),
        index,
        command: step.run ?? '',
        env: step.env,
        timeoutMs: toTimeoutMs(step['timeout-minutes']),
      };
    });

    return {
      key,
      name: raw.name ?? key,
      steps,
      env: raw.env,
      branches: raw.branches ? this.compilePatterns(raw.branches, `${path}.branches`, issues) : null,
      needs: [...new Set(raw.needs)],
      timeoutMs: toTimeoutMs(raw['timeout-minutes']),
    };
  }

  private compilePatterns(
    patterns: string[],
    path: string,
    issues: DefinitionIssue[],
  ): BranchFilter | null {
    if (patterns.length === 0) return null;
    const blank = patterns.findIndex((p) => p.replace(/^!/, '').trim() === '');
    if (blank >= 0) {
      issues.push({ path: `${path}.${blank}`, message: 'branch pattern must not be empty' });
      return null;
    }
    try {
      return compileBranchFilter(patterns);
    } catch (err) {
      issues.push({ path, message: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }
}

/** Depth-first search over needs edges; returns the first cycle found as a key path. */
function findCycle(jobs: readonly JobDefinition[]): string[] | null {
  const byKey = new Map(jobs.map((j) => [j.key, j]));
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (key: string): string[] | null => {
    const current = state.get(key);
    if (current === 'done') return null;
    if (current === 'visiting') return [...stack.slice(stack.indexOf(key)), key];

    state.set(key, 'visiting');
    stack.push(key);
    for (const need of byKey.get(key)?.needs ?? []) {
      const cycle = visit(need);
      if (cycle) return cycle;
    }
    stack.pop();
    state.set(key, 'done');
    return null;
  };

  for (const job of jobs) {
    const cycle = visit(job.key);
    if (cycle) return cycle;
  }
  return null;
}
