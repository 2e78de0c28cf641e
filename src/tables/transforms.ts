import type { GitLabUserRef } from '../gitlab/types.js';
import { getField } from '../plugin/transform.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const ACCESS_LEVELS: Record<number, string> = {
  0: 'No Permissions',
  5: 'Minimal Access',
  10: 'Guest',
  20: 'Reporter',
  30: 'Developer',
  40: 'Maintainer',
  50: 'Owner',
};

/**
 * Parse a date-only string (YYYY-MM-DD) into a Date at midnight UTC.
 * Null or empty input yields null.
 */
export function parseIsoDate(value: unknown): Date | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const match = typeof value === 'string' ? ISO_DATE.exec(value) : null;
  if (!match) {
    throw new Error(`Invalid date "${String(value)}", expected YYYY-MM-DD`);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.getUTCDate() !== Number(day)) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return date;
}

/**
 * Flatten an assignee list into usernames, keeping upstream order
 */
export function parseAssignees(value: unknown): string[] | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (!Array.isArray(value) || !value.every(isUserRef)) {
    throw new Error('Expected a list of assignees');
  }
  return value.map((assignee) => assignee.username);
}

function isUserRef(value: unknown): value is GitLabUserRef {
  return typeof value === 'object' && value !== null &&
    'username' in value && typeof value.username === 'string';
}

/**
 * Map a numeric access level to its label; unknown codes have no permissions
 */
export function parseAccessLevel(level: number): string {
  return ACCESS_LEVELS[level] ?? 'No Permissions';
}

/**
 * Label for the caller's highest project or group access level.
 * Null when the response carries no permissions block.
 */
export function parsePermissions(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const levels = ['project_access', 'group_access']
    .map((key) => getField(value, `${key}.access_level`))
    .filter((level): level is number => typeof level === 'number');

  return parseAccessLevel(levels.length > 0 ? Math.max(...levels) : 0);
}
