import type { QualValue } from './types.js';

/**
 * Equality predicates keyed by column name
 */
export class QualMap {
  private values: Map<string, QualValue>;

  constructor(entries: Record<string, QualValue> | Array<[string, QualValue]> = {}) {
    this.values = Array.isArray(entries)
      ? new Map(entries)
      : new Map(Object.entries(entries));
  }

  has(column: string): boolean {
    return this.values.has(column);
  }

  get(column: string): QualValue | undefined {
    return this.values.get(column);
  }

  getString(column: string): string | undefined {
    const value = this.values.get(column);
    return typeof value === 'string' ? value : undefined;
  }

  getInt(column: string): number | undefined {
    const value = this.values.get(column);
    return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
  }

  getBool(column: string): boolean | undefined {
    const value = this.values.get(column);
    return typeof value === 'boolean' ? value : undefined;
  }

  columns(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, QualValue]> {
    return [...this.values.entries()];
  }

  /**
   * Keep only the predicates on the given columns
   */
  pick(columns: readonly string[]): QualMap {
    return new QualMap(this.entries().filter(([column]) => columns.includes(column)));
  }
}
