export {
  parseConfigString,
  parseConfigFile,
  findConnectionByName,
  loadConnectionSettings,
  validateConnectionSettings,
  isGitLabCloud,
  GITLAB_CLOUD_API_URL,
} from './parser.js';

export type {
  ConfigFile,
  ConnectionConfig,
  ConnectionEnv,
  ConnectionSettings,
} from '../types/config.js';

export {
  ConfigFileSchema,
  ConnectionConfigSchema,
  ConfigurationError,
} from '../types/config.js';
