import * as yaml from 'js-yaml';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { normalizeApiBaseUrl } from '../gitlab/client.js';
import {
  ConfigFileSchema,
  ConfigurationError,
  ConnectionConfig,
  ConnectionEnv,
  ConnectionSettings,
} from '../types/config.js';

/** Base address of the hosted multi-tenant GitLab deployment */
export const GITLAB_CLOUD_API_URL = 'https://gitlab.com/api/v4';

/**
 * Parse and validate a YAML connection configuration string
 */
export function parseConfigString(yamlContent: string): ConnectionConfig[] {
  const rawConfig = yaml.load(yamlContent);

  if (typeof rawConfig !== 'object' || rawConfig === null) {
    throw new ConfigurationError('Configuration must be a valid YAML object');
  }

  const validationResult = ConfigFileSchema.safeParse(rawConfig);

  if (!validationResult.success) {
    const issues = validationResult.error.issues;
    const errors = issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Configuration validation failed:\n${errors}`);
  }

  return validationResult.data.connections;
}

/**
 * Parse connection configuration from a file path
 */
export function parseConfigFile(filePath: string): ConnectionConfig[] {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Configuration file not found: ${absolutePath}`);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  return parseConfigString(content);
}

/**
 * Find a connection by name (case-insensitive)
 */
export function findConnectionByName(
  connections: ConnectionConfig[],
  name: string
): ConnectionConfig | undefined {
  const lowerName = name.toLowerCase();
  return connections.find((c) => c.name.toLowerCase() === lowerName);
}

/**
 * Merge environment defaults with a connection block.
 * A value present in the connection block wins, even when empty.
 */
export function loadConnectionSettings(
  connection: ConnectionConfig | undefined,
  env: ConnectionEnv = process.env
): ConnectionSettings {
  let baseUrl = env.GITLAB_ADDR ?? '';
  let token = env.GITLAB_TOKEN ?? '';

  if (connection) {
    if (connection.baseurl !== undefined) {
      baseUrl = connection.baseurl;
    }
    if (connection.token !== undefined) {
      token = connection.token;
    }
  }

  return { baseUrl, token };
}

/**
 * Check that both required fields are set, failing with the message for the first one missing
 */
export function validateConnectionSettings(settings: ConnectionSettings): ConnectionSettings {
  if (settings.baseUrl === '') {
    throw new ConfigurationError(
      'GitLab base address must be set either in GITLAB_ADDR env var or in connection config file',
      'baseUrl'
    );
  }
  if (settings.token === '') {
    throw new ConfigurationError(
      'GitLab private/personal access token must be set either in GITLAB_TOKEN env var or in connection config file',
      'token'
    );
  }
  return settings;
}

/**
 * Whether the settings point at the hosted gitlab.com deployment, compared
 * on the API address the client will actually call
 */
export function isGitLabCloud(settings: ConnectionSettings): boolean {
  if (settings.baseUrl === '') {
    return false;
  }
  return normalizeApiBaseUrl(settings.baseUrl) === normalizeApiBaseUrl(GITLAB_CLOUD_API_URL);
}
