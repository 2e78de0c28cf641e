/**
 * Translation of equality predicates into upstream list filters
 */

import type { IssueFilterOptions, ProjectFilterOptions } from '../gitlab/types.js';
import type { Logger } from '../logging/logger.js';
import type { QualMap } from '../plugin/quals.js';

export interface QualApplier<O> {
  column: string;
  apply(options: O, quals: QualMap): void;
}

function stringQual<O>(column: string, set: (options: O, value: string) => void): QualApplier<O> {
  return {
    column,
    apply: (options, quals) => {
      const value = quals.getString(column);
      if (value !== undefined) {
        set(options, value);
      }
    },
  };
}

function intQual<O>(column: string, set: (options: O, value: number) => void): QualApplier<O> {
  return {
    column,
    apply: (options, quals) => {
      const value = quals.getInt(column);
      if (value !== undefined) {
        set(options, value);
      }
    },
  };
}

function boolQual<O>(column: string, set: (options: O, value: boolean) => void): QualApplier<O> {
  return {
    column,
    apply: (options, quals) => {
      const value = quals.getBool(column);
      if (value !== undefined) {
        set(options, value);
      }
    },
  };
}

// `author` is accepted by the issue table but the list endpoints
// take no author username filter, so it is left to the host's row filter.
export const ISSUE_QUAL_APPLIERS: ReadonlyArray<QualApplier<IssueFilterOptions>> = [
  stringQual('assignee', (o, v) => { o.assignee_username = v; }),
  intQual('assignee_id', (o, v) => { o.assignee_id = v; }),
  intQual('author_id', (o, v) => { o.author_id = v; }),
  boolQual('confidential', (o, v) => { o.confidential = v; }),
  stringQual('search_string', (o, v) => { o.search = v; }),
];

export const PROJECT_QUAL_APPLIERS: ReadonlyArray<QualApplier<ProjectFilterOptions>> = [
  boolQual('archived', (o, v) => { o.archived = v; }),
  stringQual('visibility', (o, v) => { o.visibility = v; }),
];

/**
 * Apply every predicate that has an upstream filter, in order
 */
export function applyQuals<O>(
  options: O,
  quals: QualMap,
  appliers: ReadonlyArray<QualApplier<O>>,
  logger?: Logger
): O {
  for (const applier of appliers) {
    if (!quals.has(applier.column)) {
      continue;
    }
    applier.apply(options, quals);
    logger?.debug('applied qual', { column: applier.column, value: quals.get(applier.column) });
  }
  return options;
}
