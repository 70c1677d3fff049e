import { Logger } from '@nestjs/common';
import { Subject } from 'rxjs';
import type { Observable } from 'rxjs';
import { settingsSchema } from '@layerforge/shared';
import type { SettingsInput, SettingsKey, SettingsValues } from '@layerforge/shared';
import { validateEnv } from './env.config';
import { configureLogging } from './logging.config';

export interface SettingsChange<K extends SettingsKey = SettingsKey> {
  key: K;
  value: SettingsValues[K];
}

/**
 * User settings shared by every document session. Values are validated on write
 * and each change is published on `changed$`.
 */
export class Settings {
  private readonly logger = new Logger(Settings.name);
  private readonly changes = new Subject<SettingsChange>();
  readonly changed$: Observable<SettingsChange> = this.changes.asObservable();
  private values: SettingsValues;

  constructor(initial: SettingsInput = {}) {
    this.values = settingsSchema.parse(initial);
  }

  /** Validate the environment, apply its log level and seed the settings from it */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Settings {
    const config = validateEnv(env);
    configureLogging(config.LOG_LEVEL);
    return new Settings({
      historySize: config.HISTORY_SIZE_MB,
      selectionGrow: config.SELECTION_GROW,
      selectionFeather: config.SELECTION_FEATHER,
      selectionPadding: config.SELECTION_PADDING,
      showControlEnd: config.SHOW_CONTROL_END,
    });
  }

  get<K extends SettingsKey>(key: K): SettingsValues[K] {
    return this.values[key];
  }

  /** Throws a ZodError if the value is out of range */
  set<K extends SettingsKey>(key: K, value: SettingsValues[K]): void {
    const next = settingsSchema.parse({ ...this.values, [key]: value });
    if (Object.is(next[key], this.values[key])) return;
    this.values = next;
    this.logger.debug(`Setting ${key} changed to ${String(next[key])}`);
    this.changes.next({ key, value: next[key] });
  }

  snapshot(): SettingsValues {
    return { ...this.values };
  }
}
