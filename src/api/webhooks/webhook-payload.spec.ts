import { getEventFromPayload, getRepoFromPayload, readWebhookPayload } from './webhook-payload';

describe('webhook payloads', () => {
  it('reads a GitHub push', () => {
    const payload = readWebhookPayload({
      ref: 'refs/heads/main',
      after: 'abc123',
      repository: {
        full_name: 'example/rust-library',
        clone_url: 'https://github.com/example/rust-library.git',
      },
    });
    const repo = getRepoFromPayload(payload);

    expect(repo).toBe('example/rust-library');
    expect(getEventFromPayload(payload, repo ?? '', 'push')).toEqual({
      kind: 'push',
      ref: 'refs/heads/main',
      commit: 'abc123',
      repository: 'https://github.com/example/rust-library.git',
    });
  });

  it('reads a GitHub pull request from its head', () => {
    const payload = readWebhookPayload({
      action: 'opened',
      pull_request: { head: { ref: 'feature', sha: 'def456' } },
      repository: { full_name: 'example/rust-library' },
    });

    expect(getEventFromPayload(payload, 'example/rust-library', 'pull_request')).toEqual({
      kind: 'pull_request',
      ref: 'feature',
      commit: 'def456',
      repository: 'example/rust-library',
    });
  });

  it('reads a GitLab push', () => {
    const payload = readWebhookPayload({
      object_kind: 'push',
      ref: 'refs/heads/main',
      checkout_sha: 'fed321',
      project: {
        path_with_namespace: 'group/project',
        git_http_url: 'https://gitlab.example.com/group/project.git',
      },
    });
    const repo = getRepoFromPayload(payload);

    expect(repo).toBe('group/project');
    expect(getEventFromPayload(payload, repo ?? '')).toEqual({
      kind: 'push',
      ref: 'refs/heads/main',
      commit: 'fed321',
      repository: 'https://gitlab.example.com/group/project.git',
    });
  });

  it('reads a GitLab merge request', () => {
    const payload = readWebhookPayload({
      object_kind: 'merge_request',
      project: { path_with_namespace: 'group/project' },
      object_attributes: { source_branch: 'feature', last_commit: { id: '987abc' } },
    });

    expect(getEventFromPayload(payload, 'group/project', 'Merge Request Hook')).toMatchObject({
      kind: 'pull_request',
      ref: 'feature',
      commit: '987abc',
    });
  });

  it('accepts a bare repo field and ignores fields of the wrong type', () => {
    const payload = readWebhookPayload({ repo: 'example/tool', ref: 42, repository: 'not-an-object' });

    expect(getRepoFromPayload(payload)).toBe('example/tool');
    expect(getEventFromPayload(payload, 'example/tool')).toEqual({
      kind: 'push',
      ref: '',
      commit: '',
      repository: 'example/tool',
    });
  });

  it('finds no repository in an unrelated body', () => {
    expect(getRepoFromPayload(readWebhookPayload({ zen: 'Keep it simple.' }))).toBeNull();
    expect(getRepoFromPayload(readWebhookPayload('not an object'))).toBeNull();
  });
});
