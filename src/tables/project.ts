import type { GitLabProject, ProjectFilterOptions } from '../gitlab/types.js';
import { paginate } from '../plugin/pagination.js';
import { fromField } from '../plugin/transform.js';
import type { Column, QueryData, Table } from '../plugin/types.js';
import { connect } from './connect.js';
import { applyQuals, PROJECT_QUAL_APPLIERS } from './quals.js';
import { parseIsoDate, parsePermissions } from './transforms.js';

// TODO: allow full_path as a get key once lookups by URL-encoded path are wired into the client
export function projectColumns(): Column[] {
  return [
    { name: 'id', type: 'INT', description: 'The ID of the project.' },
    { name: 'name', type: 'STRING', description: 'The projects name.' },
    { name: 'path', type: 'STRING', description: 'The projects path.' },
    { name: 'description', type: 'STRING', description: 'The projects description.' },
    { name: 'default_branch', type: 'STRING', description: 'The projects default branch name.' },
    { name: 'full_name', type: 'STRING', description: 'The projects name including namespace.', transform: fromField('name_with_namespace') },
    { name: 'full_path', type: 'STRING', description: 'The projects path including namespace.', transform: fromField('path_with_namespace') },
    { name: 'public', type: 'BOOL', description: 'Indicates if the project is public.' },
    { name: 'visibility', type: 'STRING', description: 'The projects visibility level (private/public/internal).' },
    { name: 'web_url', type: 'STRING', description: 'The projects url.' },
    { name: 'tag_list', type: 'JSON', description: 'An array of tags associated to the project.' },
    { name: 'topics', type: 'JSON', description: 'An array of topics associated to the project.' },
    { name: 'issues_enabled', type: 'BOOL', description: 'Indicates if project has issues enabled.' },
    { name: 'open_issues_count', type: 'INT', description: 'A count of open issues on the project.' },
    { name: 'merge_requests_enabled', type: 'BOOL', description: 'Indicates if merge requests are enabled on the project.' },
    { name: 'approvals_before_merge', type: 'INT', description: 'The project setting for number of approvals required before a merge request can be merged.' },
    { name: 'jobs_enabled', type: 'BOOL', description: 'Indicates if the project has jobs enabled.' },
    { name: 'wiki_enabled', type: 'BOOL', description: 'Indicates if the project has the wiki enabled.' },
    { name: 'snippets_enabled', type: 'BOOL', description: 'Indicates if the project has snippets enabled.' },
    { name: 'container_registry_enabled', type: 'BOOL', description: 'Indicates if the project has the container registry enabled.' },
    { name: 'creator_id', type: 'INT', description: 'The ID of the projects creator - link to `gitlab_user.id`.' },
    { name: 'created_at', type: 'TIMESTAMP', description: 'Timestamp of when project was created.' },
    { name: 'last_activity_at', type: 'TIMESTAMP', description: 'Timestamp of when last activity happened on the project.' },
    { name: 'marked_for_deletion_at', type: 'TIMESTAMP', description: 'Timestamp of when project was marked for deletion.', transform: fromField('marked_for_deletion_at').nullIfZero().transform(parseIsoDate) },
    { name: 'empty_repo', type: 'BOOL', description: 'Indicates if the repository of the project is empty.' },
    { name: 'archived', type: 'BOOL', description: 'Indicates if the project is archived.' },
    { name: 'avatar_url', type: 'STRING', description: 'The url for the projects avatar.' },
    { name: 'forks_count', type: 'INT', description: 'The number of forks of the project.' },
    { name: 'star_count', type: 'INT', description: 'The number of stars given to the project.' },
    { name: 'lfs_enabled', type: 'BOOL', description: 'Indicates if the project has large file system enabled.' },
    { name: 'request_access_enabled', type: 'BOOL', description: 'Indicates if the project has request access enabled.' },
    { name: 'packages_enabled', type: 'BOOL', description: 'Indicates if the project has packages enabled.' },
    { name: 'owner_id', type: 'INT', description: 'The projects owner ID (null if owned by a group) - link to `gitlab_user.id`.', transform: fromField('owner.id') },
    { name: 'owner_username', type: 'STRING', description: 'The projects owner username (null if owned by a group) - link to `gitlab_user.username`.', transform: fromField('owner.username') },
    { name: 'namespace_id', type: 'INT', description: 'The ID of the namespace the project lives in.', transform: fromField('namespace.id') },
    { name: 'namespace_kind', type: 'STRING', description: 'The kind of namespace the project lives in (user/group).', transform: fromField('namespace.kind') },
    { name: 'namespace_full_path', type: 'STRING', description: 'The full path of the namespace the project lives in.', transform: fromField('namespace.full_path') },
    { name: 'access_level', type: 'STRING', description: 'The highest access level the token user holds on the project.', transform: fromField('permissions').transform(parsePermissions) },
  ];
}

export function tableProject(): Table<GitLabProject> {
  return {
    name: 'gitlab_project',
    description: 'Projects in the GitLab instance.',
    list: {
      hydrate: listProjects,
      optionalKeyColumns: PROJECT_QUAL_APPLIERS.map((a) => a.column),
    },
    get: {
      keyColumns: ['id'],
      hydrate: getProject,
    },
    columns: projectColumns(),
  };
}

export async function listProjects(d: QueryData<GitLabProject>): Promise<void> {
  const client = connect(d);
  const filters = applyQuals<ProjectFilterOptions>({}, d.quals, PROJECT_QUAL_APPLIERS, d.logger);

  await paginate(
    (page, perPage) => client.listProjects({ ...filters, page, per_page: perPage }),
    (project) => d.streamListItem(project),
    { isDone: () => d.rowsRemaining() === 0 }
  );
}

export async function getProject(d: QueryData<GitLabProject>): Promise<GitLabProject | null> {
  const id = d.quals.getInt('id');
  if (id === undefined) {
    return null;
  }

  const client = connect(d);
  return client.getProject(id);
}
