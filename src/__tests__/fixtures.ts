import type { GitLabIssue, GitLabProject } from '../gitlab/types.js';
import type { ConnectionSettings } from '../types/config.js';

export const SELF_MANAGED: ConnectionSettings = {
  baseUrl: 'https://gitlab.example.com',
  token: 'test-token',
};

export const GITLAB_CLOUD: ConnectionSettings = {
  baseUrl: 'https://gitlab.com/api/v4',
  token: 'test-token',
};

export const API = 'https://gitlab.example.com/api/v4/';

// Build a fetch Response carrying a JSON body and GitLab pagination headers
export function jsonResponse(
  body: unknown,
  options: { status?: number; nextPage?: number } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: options.status ?? 200,
    headers: {
      'Content-Type': 'application/json',
      'X-Next-Page': options.nextPage ? String(options.nextPage) : '',
    },
  });
}

export function createMockProject(id: number, overrides: Partial<GitLabProject> = {}): GitLabProject {
  return {
    id,
    name: `App ${id}`,
    path: `app-${id}`,
    description: null,
    default_branch: 'main',
    name_with_namespace: `Platform / App ${id}`,
    path_with_namespace: `platform/app-${id}`,
    visibility: 'internal',
    web_url: `https://gitlab.example.com/platform/app-${id}`,
    tag_list: [],
    topics: ['backend'],
    issues_enabled: true,
    open_issues_count: 4,
    created_at: '2023-06-01T10:00:00.000Z',
    last_activity_at: '2024-02-01T08:30:00.000Z',
    marked_for_deletion_at: null,
    archived: false,
    avatar_url: null,
    forks_count: 1,
    star_count: 12,
    owner: null,
    namespace: { id: 9, name: 'Platform', path: 'platform', kind: 'group', full_path: 'platform' },
    ...overrides,
  };
}

export function createMockIssue(id: number, overrides: Partial<GitLabIssue> = {}): GitLabIssue {
  return {
    id,
    iid: id,
    project_id: 7,
    title: `Issue ${id}`,
    description: null,
    state: 'opened',
    external_id: null,
    author: { id: 3, username: 'bob' },
    assignee: { id: 5, username: 'alice' },
    assignees: [{ id: 5, username: 'alice' }],
    closed_by: null,
    labels: ['bug'],
    upvotes: 1,
    downvotes: 0,
    due_date: null,
    web_url: `https://gitlab.example.com/platform/app-7/-/issues/${id}`,
    confidential: false,
    discussion_locked: null,
    created_at: '2024-01-02T03:04:05.000Z',
    updated_at: '2024-01-03T00:00:00.000Z',
    closed_at: null,
    ...overrides,
  };
}
