import type { GitLabIssue, IssueFilterOptions } from '../gitlab/types.js';
import { UnsupportedQueryError } from '../plugin/errors.js';
import { paginate } from '../plugin/pagination.js';
import { fromField, fromValue } from '../plugin/transform.js';
import type { Column, QueryData, Table } from '../plugin/types.js';
import { connect, isGitLabCloudQuery } from './connect.js';
import { applyQuals, ISSUE_QUAL_APPLIERS } from './quals.js';
import { parseAssignees, parseIsoDate } from './transforms.js';

export const ISSUE_TABLE_NAME = 'gitlab_issue';

/** On gitlab.com an unfiltered instance-wide listing is rejected upstream */
export const CLOUD_REQUIRED_QUALS = ['assignee', 'assignee_id', 'author_id', 'project_id'];

export function issueColumns(): Column[] {
  return [
    { name: 'id', type: 'INT', description: 'The ID of the Issue.' },
    { name: 'iid', type: 'INT', description: 'The ID of the Issue within its project.' },
    { name: 'title', type: 'STRING', description: 'The title of the Issue.' },
    { name: 'description', type: 'STRING', description: 'The description of the Issue.' },
    { name: 'state', type: 'STRING', description: 'The state of the Issue (opened, closed, etc).' },
    { name: 'project_id', type: 'INT', description: 'The ID of the project - link to `gitlab_project.id`.' },
    { name: 'external_id', type: 'STRING', description: 'The external ID of the issue.' },
    { name: 'author_id', type: 'INT', description: 'The ID of the author - link to `gitlab_user.id`.', transform: fromField('author.id') },
    { name: 'author', type: 'STRING', description: 'The username of the author - link to `gitlab_user.username`.', transform: fromField('author.username') },
    { name: 'created_at', type: 'TIMESTAMP', description: 'Timestamp of issue creation.' },
    { name: 'updated_at', type: 'TIMESTAMP', description: 'Timestamp of last update to the issue.' },
    { name: 'closed_at', type: 'TIMESTAMP', description: 'Timestamp of when issue was closed (null if not closed).' },
    { name: 'closed_by_id', type: 'INT', description: 'The ID of the user who closed the issue - link to `gitlab_user.id`.', transform: fromField('closed_by.id') },
    { name: 'closed_by', type: 'STRING', description: 'The username of the user who closed the issue - link to `gitlab_user.username`.', transform: fromField('closed_by.username') },
    { name: 'assignee_id', type: 'INT', description: 'The ID of the user assigned to the issue - link to `gitlab_user.id`.', transform: fromField('assignee.id') },
    { name: 'assignee', type: 'STRING', description: 'The username of the user assigned to the issue - link to `gitlab_user.username`.', transform: fromField('assignee.username') },
    { name: 'assignees', type: 'JSON', description: 'An array of assigned usernames, for when more than one user is assigned.', transform: fromField('assignees').transform(parseAssignees) },
    { name: 'labels', type: 'JSON', description: 'An array of label names on the issue.' },
    { name: 'upvotes', type: 'INT', description: 'Count of up-votes received on the issue.' },
    { name: 'downvotes', type: 'INT', description: 'Count of down-votes received on the issue.' },
    { name: 'due_date', type: 'TIMESTAMP', description: 'Timestamp of due date for the issue to be completed by.', transform: fromField('due_date').nullIfZero().transform(parseIsoDate) },
    { name: 'web_url', type: 'STRING', description: 'The url to access the issue.' },
    { name: 'confidential', type: 'BOOL', description: 'Indicates if the issue is marked as confidential.' },
    { name: 'discussion_locked', type: 'BOOL', description: 'Indicates if the issue has the discussions locked against new input.' },

    { name: 'search_string', type: 'STRING', description: 'Search string to limit results.', hydrate: searchStringFromQuals, transform: fromValue() },
  ];
}

export function tableIssue(): Table<GitLabIssue> {
  return {
    name: ISSUE_TABLE_NAME,
    description: 'All GitLab Issues.',
    list: {
      hydrate: listIssues,
      optionalKeyColumns: ['assignee', 'assignee_id', 'author', 'author_id', 'confidential', 'search_string', 'project_id'],
    },
    columns: issueColumns(),
  };
}

export async function listIssues(d: QueryData<GitLabIssue>): Promise<void> {
  const q = d.quals;

  if (!CLOUD_REQUIRED_QUALS.some((column) => q.has(column)) && isGitLabCloudQuery(d)) {
    throw new UnsupportedQueryError(ISSUE_TABLE_NAME, CLOUD_REQUIRED_QUALS, 'When using this table with gitlab cloud');
  }

  if (q.has('project_id')) {
    return listProjectIssues(d);
  }

  return listAllIssues(d);
}

function issueFilters(d: QueryData<GitLabIssue>): IssueFilterOptions {
  return applyQuals<IssueFilterOptions>({ scope: 'all' }, d.quals, ISSUE_QUAL_APPLIERS, d.logger);
}

export async function listAllIssues(d: QueryData<GitLabIssue>): Promise<void> {
  const client = connect(d);
  const filters = issueFilters(d);

  await paginate(
    (page, perPage) => client.listIssues({ ...filters, page, per_page: perPage }),
    (issue) => d.streamListItem(issue),
    { isDone: () => d.rowsRemaining() === 0 }
  );
}

/**
 * Issues of a single project; takes the same filters as the instance-wide listing
 */
export async function listProjectIssues(d: QueryData<GitLabIssue>): Promise<void> {
  const projectId = d.quals.getInt('project_id');
  if (projectId === undefined) {
    return;
  }

  const client = connect(d);
  const filters = issueFilters(d);

  await paginate(
    (page, perPage) => client.listProjectIssues(projectId, { ...filters, page, per_page: perPage }),
    (issue) => d.streamListItem(issue),
    { isDone: () => d.rowsRemaining() === 0 }
  );
}

export function searchStringFromQuals(d: QueryData): string | null {
  return d.quals.getString('search_string') ?? null;
}
