export {
  GitLabClient,
  GitLabClientError,
  normalizeApiBaseUrl,
  parseNextPage,
  toQueryString,
} from './client.js';
export type { GitLabClientOptions } from './client.js';

export type {
  GitLabUserRef,
  GitLabNamespace,
  GitLabAccess,
  GitLabProject,
  GitLabIssue,
  ListOptions,
  ProjectFilterOptions,
  IssueFilterOptions,
  ListProjectsOptions,
  ListIssuesOptions,
  CurrentUserResponse,
} from './types.js';

export { CURRENT_USER } from './queries.js';
