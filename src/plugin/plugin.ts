/**
 * Table host: dispatches a query to a table's get or list hydrate, turns each
 * streamed item into a row and applies the equality predicates to it.
 */

import type { ConnectionSettings } from '../types/config.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { QueryError, TransformError } from './errors.js';
import { QualMap } from './quals.js';
import { fromColumnName } from './transform.js';
import type {
  Column,
  QualValue,
  QueryData,
  QueryOptions,
  Row,
  Table,
} from './types.js';

export interface PluginDefinition {
  name: string;
  tables: Table[];
}

function qualMatchesType(column: Column, value: QualValue): boolean {
  switch (column.type) {
    case 'INT':
      return typeof value === 'number' && Number.isInteger(value);
    case 'DOUBLE':
      return typeof value === 'number';
    case 'BOOL':
      return typeof value === 'boolean';
    case 'STRING':
      return typeof value === 'string';
    case 'TIMESTAMP':
      return typeof value === 'string' && !Number.isNaN(Date.parse(value));
    case 'JSON':
      return false;
  }
}

/**
 * Check every predicate names a known column and carries a value of its type
 */
export function validateQuals(table: Table, quals: QualMap): void {
  for (const [name, value] of quals.entries()) {
    const column = table.columns.find((c) => c.name === name);
    if (!column) {
      throw new QueryError(`Column "${name}" does not exist in table ${table.name}`, table.name, name);
    }
    if (column.type === 'JSON') {
      throw new QueryError(`Column "${name}" of type JSON does not support '=' quals`, table.name, name);
    }
    if (!qualMatchesType(column, value)) {
      throw new QueryError(
        `Column "${name}" expects a ${column.type} value, got ${JSON.stringify(value)}`,
        table.name,
        name
      );
    }
  }
}

function coerceValue(column: Column, value: unknown): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  if (column.type === 'TIMESTAMP' && typeof value === 'string') {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      throw new TransformError(column.name, value, `cannot parse "${value}" as a timestamp`);
    }
    return date;
  }
  return value;
}

/**
 * Build a row from one upstream item by running every column's hydrate and transform
 */
export function buildRow(table: Table, d: QueryData, item: unknown): Row {
  const row: Row = {};
  for (const column of table.columns) {
    const source = column.hydrate ? column.hydrate(d, item) : item;
    const transform = column.transform ?? fromColumnName();
    row[column.name] = coerceValue(column, transform.apply(source, column.name));
  }
  return row;
}

/**
 * Whether a row equals every predicate
 */
export function matchesQuals(table: Table, row: Row, quals: QualMap): boolean {
  return quals.entries().every(([name, expected]) => {
    const actual = row[name];
    const column = table.columns.find((c) => c.name === name);
    if (column?.type === 'TIMESTAMP' && typeof expected === 'string') {
      return actual instanceof Date && actual.getTime() === Date.parse(expected);
    }
    return actual === expected;
  });
}

export class TablePlugin {
  readonly name: string;
  private tables: Map<string, Table>;
  private logger: Logger;

  constructor(definition: PluginDefinition, logger: Logger = createLogger(definition.name)) {
    this.name = definition.name;
    this.tables = new Map(definition.tables.map((t) => [t.name, t]));
    this.logger = logger;
  }

  listTables(): Table[] {
    return [...this.tables.values()];
  }

  getTable(name: string): Table {
    const table = this.tables.get(name);
    if (!table) {
      throw new QueryError(`Table "${name}" does not exist in plugin ${this.name}`, name);
    }
    return table;
  }

  /**
   * Run a query against a table, sending each matching row to the sink
   *
   * @returns the number of rows sent
   */
  async query(
    tableName: string,
    quals: Record<string, QualValue>,
    settings: ConnectionSettings,
    sink: (row: Row) => void,
    options: QueryOptions = {}
  ): Promise<number> {
    const table = this.getTable(tableName);
    const allQuals = new QualMap(quals);
    validateQuals(table, allQuals);

    const get = table.get && table.get.keyColumns.every((c) => allQuals.has(c))
      ? table.get
      : undefined;
    const hydrateColumns = get ? get.keyColumns : table.list.optionalKeyColumns ?? [];

    let sent = 0;
    const rowsRemaining = (): number =>
      options.limit === undefined ? Infinity : Math.max(options.limit - sent, 0);

    if (rowsRemaining() === 0) {
      return 0;
    }

    const d: QueryData = {
      table: table.name,
      settings,
      quals: allQuals.pick(hydrateColumns),
      logger: this.logger,
      rowsRemaining,
      streamListItem: (item) => {
        if (rowsRemaining() === 0) {
          return;
        }
        const row = buildRow(table, d, item);
        if (matchesQuals(table, row, allQuals)) {
          sent++;
          sink(row);
        }
      },
    };

    this.logger.debug('query', { table: table.name, mode: get ? 'get' : 'list', quals });

    if (get) {
      const item = await get.hydrate(d);
      if (item !== null) {
        d.streamListItem(item);
      }
    } else {
      await table.list.hydrate(d);
    }

    return sent;
  }
}
