import { GitLabClient } from '../gitlab/client.js';
import { isGitLabCloud, validateConnectionSettings } from '../config/parser.js';
import type { QueryData } from '../plugin/types.js';

/**
 * Build a client for the query's connection. Fails on missing settings without touching the network.
 */
export function connect(d: QueryData<unknown>): GitLabClient {
  const { baseUrl, token } = validateConnectionSettings(d.settings);
  return new GitLabClient({ baseUrl, token });
}

export function isGitLabCloudQuery(d: QueryData<unknown>): boolean {
  return isGitLabCloud(d.settings);
}
