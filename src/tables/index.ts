import { TablePlugin } from '../plugin/plugin.js';
import type { Logger } from '../logging/logger.js';
import { tableIssue } from './issue.js';
import { tableProject } from './project.js';

export const PLUGIN_NAME = 'gitlab';

/**
 * The GitLab table plugin with every table registered
 */
export function createGitLabPlugin(logger?: Logger): TablePlugin {
  return new TablePlugin(
    {
      name: PLUGIN_NAME,
      tables: [tableProject(), tableIssue()],
    },
    logger
  );
}

export { tableProject, projectColumns, listProjects, getProject } from './project.js';
export {
  tableIssue,
  issueColumns,
  listIssues,
  listAllIssues,
  listProjectIssues,
  searchStringFromQuals,
  CLOUD_REQUIRED_QUALS,
  ISSUE_TABLE_NAME,
} from './issue.js';
export { applyQuals, ISSUE_QUAL_APPLIERS, PROJECT_QUAL_APPLIERS } from './quals.js';
export type { QualApplier } from './quals.js';
export { parseIsoDate, parseAssignees, parseAccessLevel, parsePermissions } from './transforms.js';
export { connect, isGitLabCloudQuery } from './connect.js';
