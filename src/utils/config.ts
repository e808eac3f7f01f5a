/**
 * Runtime configuration read from environment variables.
 *
 * @module utils/config
 */

import type { NoteFormat } from '@/types';
import type { LogThreshold } from '@/utils/logger';
import { parsePositiveInt, validateLogLevel, validateNoteFormat } from '@/utils/validation';

/**
 * Resolved stack-notes settings.
 */
export interface StackNotesConfig {
  /** Number of decorated commits inspected when resolving a parent */
  historyWindow: number;

  /** Upper bound on stack length */
  maxStackDepth: number;

  /** Note format used when none is given explicitly */
  noteFormat: NoteFormat;

  logLevel: LogThreshold;
}

export const DEFAULT_CONFIG: StackNotesConfig = {
  historyWindow: 32,
  logLevel: 'warn',
  maxStackDepth: 64,
  noteFormat: 'double',
};

/**
 * Load configuration from the environment.
 *
 * Variables:
 * - STACK_NOTES_HISTORY_WINDOW (default 32)
 * - STACK_NOTES_MAX_DEPTH (default 64)
 * - STACK_NOTES_FORMAT (default double)
 * - STACK_NOTES_LOG_LEVEL (default warn)
 *
 * Empty values count as unset.
 *
 * @throws {ConfigError} If a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StackNotesConfig {
  const config: StackNotesConfig = { ...DEFAULT_CONFIG };

  const historyWindow = env.STACK_NOTES_HISTORY_WINDOW;
  if (historyWindow) {
    config.historyWindow = parsePositiveInt(historyWindow, 'STACK_NOTES_HISTORY_WINDOW');
  }

  const maxDepth = env.STACK_NOTES_MAX_DEPTH;
  if (maxDepth) {
    config.maxStackDepth = parsePositiveInt(maxDepth, 'STACK_NOTES_MAX_DEPTH');
  }

  const format = env.STACK_NOTES_FORMAT;
  if (format) {
    config.noteFormat = validateNoteFormat(format, 'STACK_NOTES_FORMAT');
  }

  const logLevel = env.STACK_NOTES_LOG_LEVEL;
  if (logLevel) {
    config.logLevel = validateLogLevel(logLevel, 'STACK_NOTES_LOG_LEVEL');
  }

  return config;
}
