import { describe, expect, it } from 'vitest';
import { ConfigError } from '@/errors';
import { DEFAULT_CONFIG, loadConfig } from '@/utils/config';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      historyWindow: 32,
      logLevel: 'warn',
      maxStackDepth: 64,
      noteFormat: 'double',
    });
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        STACK_NOTES_FORMAT: 'list',
        STACK_NOTES_HISTORY_WINDOW: '16',
        STACK_NOTES_LOG_LEVEL: 'debug',
        STACK_NOTES_MAX_DEPTH: '10',
      })
    ).toEqual({ historyWindow: 16, logLevel: 'debug', maxStackDepth: 10, noteFormat: 'list' });
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ STACK_NOTES_FORMAT: '', STACK_NOTES_HISTORY_WINDOW: '' })).toEqual(
      DEFAULT_CONFIG
    );
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ STACK_NOTES_HISTORY_WINDOW: 'many' })).toThrow(ConfigError);
    expect(() => loadConfig({ STACK_NOTES_FORMAT: 'grid' })).toThrow(
      'Invalid STACK_NOTES_FORMAT: must be one of double, list, table (got "grid")'
    );
  });

  it('does not mutate the defaults', () => {
    loadConfig({ STACK_NOTES_MAX_DEPTH: '3' });

    expect(DEFAULT_CONFIG.maxStackDepth).toBe(64);
  });
});
