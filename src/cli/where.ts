import { QueryError } from '../plugin/errors.js';
import type { QualValue, Table } from '../plugin/types.js';

const DECIMAL_INTEGER = /^-?\d+$/;

/**
 * Parse a `column=value` predicate, typing the value after the column it names
 */
export function parseWhere(table: Table, expression: string): [string, QualValue] {
  const separator = expression.indexOf('=');
  if (separator <= 0) {
    throw new QueryError(`Invalid predicate "${expression}", expected column=value`, table.name);
  }

  const name = expression.slice(0, separator).trim();
  const raw = expression.slice(separator + 1);
  const column = table.columns.find((c) => c.name === name);
  if (!column) {
    throw new QueryError(`Column "${name}" does not exist in table ${table.name}`, table.name, name);
  }

  switch (column.type) {
    case 'INT':
      if (!DECIMAL_INTEGER.test(raw)) {
        throw new QueryError(`Column "${name}" expects an integer, got "${raw}"`, table.name, name);
      }
      return [name, Number(raw)];
    case 'DOUBLE': {
      const value = Number(raw);
      if (raw.trim() === '' || Number.isNaN(value)) {
        throw new QueryError(`Column "${name}" expects a number, got "${raw}"`, table.name, name);
      }
      return [name, value];
    }
    case 'BOOL':
      if (raw !== 'true' && raw !== 'false') {
        throw new QueryError(`Column "${name}" expects true or false, got "${raw}"`, table.name, name);
      }
      return [name, raw === 'true'];
    default:
      return [name, raw];
  }
}

/**
 * Parse every predicate into a map; a repeated column keeps its last value
 */
export function parseWhereList(table: Table, expressions: string[]): Record<string, QualValue> {
  const quals: Record<string, QualValue> = {};
  for (const expression of expressions) {
    const [name, value] = parseWhere(table, expression);
    quals[name] = value;
  }
  return quals;
}
