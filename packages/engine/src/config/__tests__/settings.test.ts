import { afterEach, describe, it, expect } from 'vitest';
import { Logger } from '@nestjs/common';
import { configureLogging } from '../logging.config';
import { Settings } from '../settings';
import type { SettingsChange } from '../settings';

describe('Settings', () => {
  afterEach(() => {
    configureLogging('log');
  });

  it('starts from defaults', () => {
    expect(new Settings().snapshot()).toEqual({
      historySize: 1000,
      selectionGrow: 7,
      selectionFeather: 7,
      selectionPadding: 7,
      showControlEnd: false,
    });
  });

  it('overrides defaults with initial values', () => {
    const settings = new Settings({ historySize: 200, showControlEnd: true });
    expect(settings.get('historySize')).toBe(200);
    expect(settings.get('showControlEnd')).toBe(true);
    expect(settings.get('selectionGrow')).toBe(7);
  });

  it('publishes changes', () => {
    const settings = new Settings();
    const changes: SettingsChange[] = [];
    settings.changed$.subscribe((c) => changes.push(c));

    settings.set('selectionFeather', 20);
    settings.set('selectionFeather', 20);

    expect(settings.get('selectionFeather')).toBe(20);
    expect(changes).toEqual([{ key: 'selectionFeather', value: 20 }]);
  });

  it('rejects values outside their range', () => {
    const settings = new Settings();
    expect(() => settings.set('selectionGrow', 101)).toThrow();
    expect(settings.get('selectionGrow')).toBe(7);
  });

  it('reads the environment', () => {
    const settings = Settings.fromEnv({ HISTORY_SIZE_MB: '64', SELECTION_GROW: '3', SHOW_CONTROL_END: 'true' });
    expect(settings.snapshot()).toEqual({
      historySize: 64,
      selectionGrow: 3,
      selectionFeather: 7,
      selectionPadding: 7,
      showControlEnd: true,
    });
  });

  it('applies the log level from the environment', () => {
    Settings.fromEnv({ LOG_LEVEL: 'warn' });
    expect(Logger.isLevelEnabled('warn')).toBe(true);
    expect(Logger.isLevelEnabled('log')).toBe(false);
  });
});
