import { describe, it, expect } from 'vitest';
import { validateEnv } from '../env.config';

describe('validateEnv', () => {
  it('applies defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      LOG_LEVEL: 'log',
      HISTORY_SIZE_MB: 1000,
      SELECTION_GROW: 7,
      SELECTION_FEATHER: 7,
      SELECTION_PADDING: 7,
      SHOW_CONTROL_END: false,
    });
  });

  it('coerces numbers and flags from strings', () => {
    const config = validateEnv({
      HISTORY_SIZE_MB: '250',
      SELECTION_GROW: '12.5',
      SHOW_CONTROL_END: '1',
      LOG_LEVEL: 'debug',
    });
    expect(config.HISTORY_SIZE_MB).toBe(250);
    expect(config.SELECTION_GROW).toBe(12.5);
    expect(config.SHOW_CONTROL_END).toBe(true);
    expect(config.LOG_LEVEL).toBe('debug');
  });

  it('reads "false" as false', () => {
    expect(validateEnv({ SHOW_CONTROL_END: 'false' }).SHOW_CONTROL_END).toBe(false);
  });

  it('lists every invalid variable', () => {
    let message = '';
    try {
      validateEnv({ HISTORY_SIZE_MB: '-5', SELECTION_PADDING: '150' });
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }
    expect(message.split('\n')).toEqual([
      'Environment validation failed:',
      '  HISTORY_SIZE_MB: Number must be greater than or equal to 0',
      '  SELECTION_PADDING: Number must be less than or equal to 100',
    ]);
  });

  it('rejects unknown log levels', () => {
    expect(() => validateEnv({ LOG_LEVEL: 'chatty' })).toThrow('Environment validation failed:');
  });
});
