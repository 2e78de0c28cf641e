/**
 * GitLab REST API v4 response and request types
 */

// Minimal user reference embedded in other resources
export interface GitLabUserRef {
  id: number;
  username: string;
  name?: string;
  state?: string;
  web_url?: string;
}

export interface GitLabNamespace {
  id: number;
  name: string;
  path: string;
  kind: 'user' | 'group';
  full_path: string;
}

export interface GitLabAccess {
  access_level: number;
  notification_level?: number;
}

// Project resource
export interface GitLabProject {
  id: number;
  name: string;
  path: string;
  description: string | null;
  default_branch: string | null;
  name_with_namespace: string;
  path_with_namespace: string;
  public?: boolean;
  visibility: 'private' | 'internal' | 'public';
  web_url: string;
  tag_list?: string[];
  topics?: string[];
  issues_enabled?: boolean;
  open_issues_count?: number;
  merge_requests_enabled?: boolean;
  approvals_before_merge?: number;
  jobs_enabled?: boolean;
  wiki_enabled?: boolean;
  snippets_enabled?: boolean;
  container_registry_enabled?: boolean;
  creator_id?: number;
  created_at: string;
  last_activity_at: string;
  marked_for_deletion_at?: string | null;
  empty_repo?: boolean;
  archived: boolean;
  avatar_url: string | null;
  forks_count: number;
  star_count: number;
  lfs_enabled?: boolean;
  request_access_enabled?: boolean;
  packages_enabled?: boolean;
  owner?: GitLabUserRef | null;
  namespace?: GitLabNamespace;
  permissions?: {
    project_access: GitLabAccess | null;
    group_access: GitLabAccess | null;
  };
}

// Issue resource
export interface GitLabIssue {
  id: number;
  iid: number;
  project_id: number;
  title: string;
  description: string | null;
  state: 'opened' | 'closed';
  external_id?: string | null;
  author: GitLabUserRef;
  assignee: GitLabUserRef | null;
  assignees: GitLabUserRef[] | null;
  closed_by: GitLabUserRef | null;
  labels: string[];
  upvotes: number;
  downvotes: number;
  due_date: string | null;
  web_url: string;
  confidential: boolean;
  discussion_locked: boolean | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

// Page request parameters shared by every list endpoint
export interface ListOptions {
  page: number;
  per_page: number;
}

export interface ProjectFilterOptions {
  archived?: boolean;
  visibility?: string;
}

export interface IssueFilterOptions {
  scope?: 'all' | 'created_by_me' | 'assigned_to_me';
  assignee_username?: string;
  assignee_id?: number;
  author_id?: number;
  confidential?: boolean;
  search?: string;
}

export type ListProjectsOptions = ListOptions & ProjectFilterOptions;
export type ListIssuesOptions = ListOptions & IssueFilterOptions;

export type { Page } from '../plugin/types.js';

// GraphQL response for the token check
export interface CurrentUserResponse {
  currentUser: {
    username: string;
    name: string;
  } | null;
}
