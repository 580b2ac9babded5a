export type TriggerEventType = 'push' | 'pull_request' | 'manual';

/**
 * Normalized repository event. Everything the scheduler needs to match triggers,
 * apply branch limits and build step environments.
 */
export interface TriggerEvent {
  /** Repository identifier, matched against pipelines.repository (e.g. owner/repo) */
  repository: string;
  /** Branch name without refs/heads/ (for pull requests: the head branch) */
  branch: string;
  commitSha: string;
  eventType: TriggerEventType;
  pullRequestNumber?: number;
  /** Target branch of a pull request */
  baseBranch?: string;
  sender?: string;
  message?: string;
  receivedAt: Date;
}

/** True when both describe one delivery, e.g. the runs of several pipelines for one push. */
export function isSameEvent(a: TriggerEvent, b: TriggerEvent): boolean {
  return (
    a.eventType === b.eventType &&
    a.repository === b.repository &&
    a.branch === b.branch &&
    a.commitSha === b.commitSha &&
    a.receivedAt.getTime() === b.receivedAt.getTime()
  );
}

/** Unit of supersede and per-branch concurrency. */
export function branchKey(event: Pick<TriggerEvent, 'repository' | 'branch'>): string {
  return `${event.repository}#${event.branch}`;
}
