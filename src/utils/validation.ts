/**
 * Validation utilities for stack-notes.
 * Rejects malformed configuration and arguments with messages naming the
 * offending value.
 */

import { ConfigError } from '@/errors';
import { NOTE_FORMATS, type NoteFormat } from '@/types';
import { LOG_THRESHOLDS, type LogThreshold } from '@/utils/logger';

/**
 * Parse a positive integer setting.
 *
 * @param value - Raw value (e.g. from an environment variable)
 * @param variable - Setting name, used in the error message
 * @throws {ConfigError} If value is not a positive base-10 integer
 *
 * @example
 * parsePositiveInt('32', 'STACK_NOTES_HISTORY_WINDOW'); // 32
 * parsePositiveInt('0', 'STACK_NOTES_HISTORY_WINDOW'); // throws
 * parsePositiveInt('12abc', 'STACK_NOTES_HISTORY_WINDOW'); // throws
 */
export function parsePositiveInt(value: string, variable: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) === 0) {
    throw new ConfigError(`Invalid ${variable}: must be a positive integer (got "${value}")`, variable);
  }
  return Number.parseInt(trimmed, 10);
}

export function isNoteFormat(value: string): value is NoteFormat {
  return NOTE_FORMATS.some((format) => format === value);
}

/**
 * Validate a note format name (case-insensitive).
 *
 * @throws {ConfigError} If value is not one of double, list, table
 *
 * @example
 * validateNoteFormat('Table', '--format'); // 'table'
 * validateNoteFormat('grid', '--format'); // throws
 */
export function validateNoteFormat(value: string, variable: string): NoteFormat {
  const normalized = value.trim().toLowerCase();
  if (!isNoteFormat(normalized)) {
    throw new ConfigError(
      `Invalid ${variable}: must be one of ${NOTE_FORMATS.join(', ')} (got "${value}")`,
      variable
    );
  }
  return normalized;
}

export function validateLogLevel(value: string, variable: string): LogThreshold {
  const normalized = value.trim().toLowerCase();
  const level = LOG_THRESHOLDS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new ConfigError(
      `Invalid ${variable}: must be one of ${LOG_THRESHOLDS.join(', ')} (got "${value}")`,
      variable
    );
  }
  return level;
}

/**
 * Validate an optional branch argument.
 *
 * @returns The branch name, or undefined when not given
 * @throws {Error} If the value is not a non-empty string
 *
 * @example
 * validateOptionalBranch(undefined); // undefined
 * validateOptionalBranch('feature-a'); // 'feature-a'
 * validateOptionalBranch(''); // throws
 */
export function validateOptionalBranch(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error('branch must be a non-empty string');
  }
  if (value.startsWith('-')) {
    throw new Error(`Invalid branch name: "${value}" starts with "-"`);
  }
  return value;
}

export function validateOptionalFlag(value: unknown, name: string): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`${name} must be a boolean`);
  }
  return value;
}

/**
 * Validate an optional format argument, falling back to the configured default.
 */
export function validateOptionalFormat(value: unknown, fallback: NoteFormat): NoteFormat {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new Error('format must be a string');
  }
  return validateNoteFormat(value, 'format');
}
