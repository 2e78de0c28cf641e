import { Command } from 'commander';
import chalk from 'chalk';
import {
  findConnectionByName,
  loadConnectionSettings,
  parseConfigFile,
  validateConnectionSettings,
} from '../config/parser.js';
import { ConfigurationError } from '../types/config.js';
import type { ConnectionSettings } from '../types/config.js';
import { GitLabClient } from '../gitlab/client.js';
import { createGitLabPlugin, PLUGIN_NAME } from '../tables/index.js';
import { parseWhereList } from './where.js';

export const CONFIG_PATH_ENV = 'GITLAB_TABLES_CONFIG';

interface ConnectionOptions {
  config?: string;
  connection: string;
}

interface QueryCommandOptions extends ConnectionOptions {
  where: string[];
  limit?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Merge the environment with the named connection block, when a config file is given
 */
export function resolveSettings(
  options: ConnectionOptions,
  env: Record<string, string | undefined> = process.env
): ConnectionSettings {
  const configPath = options.config ?? env[CONFIG_PATH_ENV];
  if (!configPath) {
    return loadConnectionSettings(undefined, env);
  }

  const connection = findConnectionByName(parseConfigFile(configPath), options.connection);
  if (!connection) {
    throw new ConfigurationError(`Connection "${options.connection}" not found in ${configPath}`);
  }
  return loadConnectionSettings(connection, env);
}

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new Error(`Invalid limit "${raw}", expected a non-negative integer`);
  }
  return limit;
}

function reportError(error: unknown): void {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
}

function withConnectionOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', `YAML connection config file (default: $${CONFIG_PATH_ENV})`)
    .option('--connection <name>', 'Connection block to use from the config file', PLUGIN_NAME);
}

export function buildProgram(): Command {
  const plugin = createGitLabPlugin();
  const program = new Command();

  program
    .name('gitlab-tables')
    .description('Query GitLab projects and issues as tables')
    .version('0.1.0');

  program
    .command('tables')
    .description('List tables and their columns')
    .action(() => {
      for (const table of plugin.listTables()) {
        console.log(chalk.bold(table.name) + chalk.dim(` - ${table.description}`));
        for (const column of table.columns) {
          console.log(`  ${column.name.padEnd(28)} ${chalk.cyan(column.type.padEnd(9))} ${column.description}`);
        }
        console.log('');
      }
    });

  withConnectionOptions(
    program
      .command('query')
      .description('Query a table, printing one JSON object per row')
      .argument('<table>', 'Table name, e.g. gitlab_issue')
      .option('-w, --where <predicate>', 'Equality predicate column=value (repeatable)', collect, [])
      .option('-l, --limit <n>', 'Stop after this many rows')
  ).action(async (tableName: string, options: QueryCommandOptions) => {
    try {
      const table = plugin.getTable(tableName);
      const quals = parseWhereList(table, options.where);
      const settings = resolveSettings(options);
      await plugin.query(
        tableName,
        quals,
        settings,
        (row) => console.log(JSON.stringify(row)),
        { limit: parseLimit(options.limit) }
      );
    } catch (error) {
      reportError(error);
    }
  });

  withConnectionOptions(
    program
      .command('check')
      .description('Validate the connection settings and access token')
  ).action(async (options: ConnectionOptions) => {
    try {
      const settings = validateConnectionSettings(resolveSettings(options));
      const client = new GitLabClient(settings);
      const { username } = await client.validateToken();
      console.log(chalk.green(`Authenticated as ${username} on ${client.baseUrl}`));
    } catch (error) {
      reportError(error);
    }
  });

  return program;
}
