import { z } from 'zod';
import type { TriggerEvent } from '../domain/trigger-event';

const BRANCH_REF = 'refs/heads/';
const TAG_REF = 'refs/tags/';
const NULL_SHA = /^0+$/;

const GITHUB_PR_ACTIONS = new Set(['opened', 'synchronize', 'reopened']);
const GITLAB_MR_ACTIONS = new Set(['open', 'update', 'reopen']);

export interface EventHeaders {
  /** X-GitHub-Event */
  github?: string;
  /** X-Gitlab-Event */
  gitlab?: string;
}

export type NormalizedEvent =
  | { kind: 'event'; event: TriggerEvent }
  | { kind: 'ignored'; reason: string }
  | { kind: 'invalid'; reason: string };

const githubPushSchema = z.object({
  ref: z.string(),
  after: z.string(),
  deleted: z.boolean().optional(),
  repository: z.object({ full_name: z.string() }),
  head_commit: z.object({ message: z.string().optional() }).nullish(),
  sender: z.object({ login: z.string() }).optional(),
});

const githubPullRequestSchema = z.object({
  action: z.string(),
  number: z.number().int(),
  pull_request: z.object({
    title: z.string().optional(),
    head: z.object({ ref: z.string(), sha: z.string() }),
    base: z.object({ ref: z.string() }),
  }),
  repository: z.object({ full_name: z.string() }),
  sender: z.object({ login: z.string() }).optional(),
});

const gitlabPushSchema = z.object({
  ref: z.string(),
  after: z.string().optional(),
  checkout_sha: z.string().nullish(),
  project: z.object({ path_with_namespace: z.string() }),
  user_username: z.string().optional(),
  commits: z.array(z.object({ message: z.string().optional() })).optional(),
});

const gitlabMergeRequestSchema = z.object({
  project: z.object({ path_with_namespace: z.string() }),
  user: z.object({ username: z.string() }).optional(),
  object_attributes: z.object({
    iid: z.number().int(),
    action: z.string().optional(),
    title: z.string().optional(),
    source_branch: z.string(),
    target_branch: z.string(),
    last_commit: z.object({ id: z.string() }),
  }),
});

/** Form accepted from any other sender (scripts, other forges behind a relay). */
export const genericEventSchema = z.object({
  repository: z.string().min(1),
  branch: z.string().min(1),
  commitSha: z.string().min(1),
  eventType: z.enum(['push', 'pull_request', 'manual']).default('push'),
  pullRequestNumber: z.number().int().optional(),
  baseBranch: z.string().optional(),
  sender: z.string().optional(),
  message: z.string().optional(),
});

type Normalizer = (body: unknown, receivedAt: Date) => NormalizedEvent;

function invalid(error: z.ZodError): NormalizedEvent {
  const reason = error.issues
    .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
  return { kind: 'invalid', reason };
}

/** Branch name of a push ref, or an ignore reason for tags and other refs. */
function branchOf(ref: string): { branch: string } | { ignored: string } {
  if (ref.startsWith(BRANCH_REF)) return { branch: ref.slice(BRANCH_REF.length) };
  if (ref.startsWith(TAG_REF)) return { ignored: `tag push ${ref.slice(TAG_REF.length)}` };
  return { ignored: `unsupported ref ${ref}` };
}

const githubPush: Normalizer = (body, receivedAt) => {
  const parsed = githubPushSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  const p = parsed.data;

  const ref = branchOf(p.ref);
  if ('ignored' in ref) return { kind: 'ignored', reason: ref.ignored };
  if (p.deleted || NULL_SHA.test(p.after)) {
    return { kind: 'ignored', reason: `branch ${ref.branch} deleted` };
  }
  return {
    kind: 'event',
    event: {
      repository: p.repository.full_name,
      branch: ref.branch,
      commitSha: p.after,
      eventType: 'push',
      sender: p.sender?.login,
      message: p.head_commit?.message,
      receivedAt,
    },
  };
};

const githubPullRequest: Normalizer = (body, receivedAt) => {
  const parsed = githubPullRequestSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  const p = parsed.data;

  if (!GITHUB_PR_ACTIONS.has(p.action)) {
    return { kind: 'ignored', reason: `pull request action ${p.action}` };
  }
  return {
    kind: 'event',
    event: {
      repository: p.repository.full_name,
      branch: p.pull_request.head.ref,
      commitSha: p.pull_request.head.sha,
      eventType: 'pull_request',
      pullRequestNumber: p.number,
      baseBranch: p.pull_request.base.ref,
      sender: p.sender?.login,
      message: p.pull_request.title,
      receivedAt,
    },
  };
};

const gitlabPush: Normalizer = (body, receivedAt) => {
  const parsed = gitlabPushSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  const p = parsed.data;

  const ref = branchOf(p.ref);
  if ('ignored' in ref) return { kind: 'ignored', reason: ref.ignored };
  const sha = p.checkout_sha ?? p.after;
  if (!sha || NULL_SHA.test(sha)) {
    return { kind: 'ignored', reason: `branch ${ref.branch} deleted` };
  }
  return {
    kind: 'event',
    event: {
      repository: p.project.path_with_namespace,
      branch: ref.branch,
      commitSha: sha,
      eventType: 'push',
      sender: p.user_username,
      message: p.commits?.at(-1)?.message,
      receivedAt,
    },
  };
};

const gitlabMergeRequest: Normalizer = (body, receivedAt) => {
  const parsed = gitlabMergeRequestSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  const p = parsed.data;
  const mr = p.object_attributes;

  if (mr.action !== undefined && !GITLAB_MR_ACTIONS.has(mr.action)) {
    return { kind: 'ignored', reason: `merge request action ${mr.action}` };
  }
  return {
    kind: 'event',
    event: {
      repository: p.project.path_with_namespace,
      branch: mr.source_branch,
      commitSha: mr.last_commit.id,
      eventType: 'pull_request',
      pullRequestNumber: mr.iid,
      baseBranch: mr.target_branch,
      sender: p.user?.username,
      message: mr.title,
      receivedAt,
    },
  };
};

const generic: Normalizer = (body, receivedAt) => {
  const parsed = genericEventSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  const { branch, ...rest } = parsed.data;
  const name = branch.startsWith(BRANCH_REF) ? branch.slice(BRANCH_REF.length) : branch;
  return { kind: 'event', event: { ...rest, branch: name, receivedAt } };
};

const GITHUB = new Map<string, Normalizer>([
  ['push', githubPush],
  ['pull_request', githubPullRequest],
]);

const GITLAB = new Map<string, Normalizer>([
  ['Push Hook', gitlabPush],
  ['Merge Request Hook', gitlabMergeRequest],
]);

/**
 * Turn a forge webhook into a TriggerEvent. The forge is recognised by its event header;
 * without one the body must use the generic form.
 */
export function normalizeEvent(
  headers: EventHeaders,
  body: unknown,
  receivedAt: Date = new Date(),
): NormalizedEvent {
  if (headers.github) {
    const normalizer = GITHUB.get(headers.github);
    return normalizer
      ? normalizer(body, receivedAt)
      : { kind: 'ignored', reason: `unsupported GitHub event ${headers.github}` };
  }
  if (headers.gitlab) {
    const normalizer = GITLAB.get(headers.gitlab);
    return normalizer
      ? normalizer(body, receivedAt)
      : { kind: 'ignored', reason: `unsupported GitLab event ${headers.gitlab}` };
  }
  return generic(body, receivedAt);
}
