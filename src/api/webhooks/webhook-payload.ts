import { z } from 'zod';
import type { TriggerEvent, TriggerKind } from '../../declaration/declaration.types';

// Every field is optional and a wrong type reads as absent: senders differ.
const text = z.string().min(1).optional().catch(undefined);
const section = <T extends z.ZodRawShape>(shape: T) => z.object(shape).optional().catch(undefined);

const webhookPayloadSchema = z.object({
  repo: text,
  ref: text,
  after: text,
  checkout_sha: text,
  object_kind: text,
  repository: section({ full_name: text, clone_url: text }),
  project: section({ path_with_namespace: text, web_url: text, git_http_url: text }),
  pull_request: section({ head: section({ ref: text, sha: text }) }),
  object_attributes: section({ source_branch: text, last_commit: section({ id: text }) }),
});

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

export function readWebhookPayload(body: unknown): WebhookPayload {
  const result = webhookPayloadSchema.safeParse(body);
  return result.success ? result.data : {};
}

/**
 * Extract repo identifier from GitHub/GitLab-style webhook payloads.
 * Pipelines are matched by pipelines.repository (e.g. full URL or "owner/repo").
 */
export function getRepoFromPayload(payload: WebhookPayload): string | null {
  if (payload.repo) return payload.repo;

  // GitHub: repository.full_name (owner/repo) or repository.clone_url
  const fromGithub = payload.repository?.full_name ?? payload.repository?.clone_url;
  if (fromGithub) return fromGithub;

  // GitLab: project.path_with_namespace or project.web_url
  return payload.project?.path_with_namespace ?? payload.project?.web_url ?? null;
}

function getKind(payload: WebhookPayload, eventHeader?: string): TriggerKind {
  const header = eventHeader?.toLowerCase() ?? '';
  if (header === 'pull_request' || header === 'merge request hook') return 'pull_request';
  if (payload.pull_request || payload.object_kind === 'merge_request') return 'pull_request';
  return 'push';
}

/**
 * Turns a push or pull request payload into the event a run is triggered with.
 * `eventHeader` is X-GitHub-Event or X-Gitlab-Event when the sender set one.
 */
export function getEventFromPayload(
  payload: WebhookPayload,
  repo: string,
  eventHeader?: string,
): TriggerEvent {
  const kind = getKind(payload, eventHeader);
  const head = payload.pull_request?.head;
  const mergeRequest = payload.object_attributes;

  const ref =
    kind === 'pull_request'
      ? (head?.ref ?? mergeRequest?.source_branch ?? '')
      : (payload.ref ?? '');
  const commit =
    kind === 'pull_request'
      ? (head?.sha ?? mergeRequest?.last_commit?.id ?? '')
      : (payload.after ?? payload.checkout_sha ?? '');
  const repository = payload.repository?.clone_url ?? payload.project?.git_http_url ?? repo;

  return { kind, ref, commit, repository };
}
