/**
 * Table host contract: descriptors, hydrate signatures and query data
 */

import type { ConnectionSettings } from '../types/config.js';
import type { Logger } from '../logging/logger.js';
import type { ColumnTransform } from './transform.js';
import type { QualMap } from './quals.js';

export type ColumnType = 'INT' | 'DOUBLE' | 'STRING' | 'BOOL' | 'TIMESTAMP' | 'JSON';

export type QualValue = string | number | boolean;

export type Row = Record<string, unknown>;

// One page of a list endpoint; nextPage is 0 when there is none
export interface Page<T> {
  items: T[];
  nextPage: number;
}

/**
 * Per-call state handed to every hydrate function
 */
export interface QueryData<T = unknown> {
  table: string;
  settings: ConnectionSettings;
  /** Equality predicates on the columns the called hydrate declares */
  quals: QualMap;
  logger: Logger;
  /** Send one upstream item to the host, which turns it into a row */
  streamListItem(item: T): void;
  /** Rows still wanted by the caller; Infinity without a limit */
  rowsRemaining(): number;
}

export interface Column {
  name: string;
  type: ColumnType;
  description: string;
  /** Defaults to reading the field named like the column */
  transform?: ColumnTransform;
  /** Replaces the upstream item as the transform's input */
  hydrate?(d: QueryData, item: unknown): unknown;
}

export interface ListConfig<T> {
  hydrate(d: QueryData<T>): Promise<void>;
  /** Columns whose equality predicates are passed to the hydrate */
  optionalKeyColumns?: string[];
}

export interface GetConfig<T> {
  keyColumns: string[];
  hydrate(d: QueryData<T>): Promise<T | null>;
}

export interface Table<T = unknown> {
  name: string;
  description: string;
  list: ListConfig<T>;
  get?: GetConfig<T>;
  columns: Column[];
}

export interface QueryOptions {
  limit?: number;
}
