/**
 * Declarative column transforms: pick a source value, then run it through a chain of steps
 */

import { TransformError } from './errors.js';

export type TransformFn = (value: unknown) => unknown;

type SourceFn = (source: unknown, column: string) => unknown;

/**
 * Read a dot-separated path from an object; any missing link yields null
 */
export function getField(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null) {
      return null;
    }
    current = (current as Record<string, unknown>)[key];
  }
  return current === undefined ? null : current;
}

function isZero(value: unknown): boolean {
  return value === null || value === undefined || value === '' || value === 0 || value === false;
}

export class ColumnTransform {
  private constructor(
    private readonly source: SourceFn,
    private readonly steps: readonly TransformFn[]
  ) {}

  static fromField(path: string): ColumnTransform {
    return new ColumnTransform((source) => getField(source, path), []);
  }

  static fromColumnName(): ColumnTransform {
    return new ColumnTransform((source, column) => getField(source, column), []);
  }

  static fromValue(): ColumnTransform {
    return new ColumnTransform((source) => source ?? null, []);
  }

  nullIfZero(): ColumnTransform {
    return this.transform((value) => (isZero(value) ? null : value));
  }

  transform(fn: TransformFn): ColumnTransform {
    return new ColumnTransform(this.source, [...this.steps, fn]);
  }

  apply(source: unknown, column: string): unknown {
    let value = this.source(source, column);
    for (const step of this.steps) {
      try {
        value = step(value);
      } catch (error) {
        if (error instanceof TransformError) {
          throw error;
        }
        throw new TransformError(column, value, error instanceof Error ? error.message : String(error));
      }
    }
    return value;
  }
}

export const fromField = (path: string): ColumnTransform => ColumnTransform.fromField(path);
export const fromValue = (): ColumnTransform => ColumnTransform.fromValue();
export const fromColumnName = (): ColumnTransform => ColumnTransform.fromColumnName();
