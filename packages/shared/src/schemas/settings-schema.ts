import { z } from 'zod';
import { HISTORY_LIMITS, SELECTION_LIMITS } from '../constants/limits';

const percentSchema = z.number().min(0).max(SELECTION_LIMITS.MAX_PERCENT);

export const settingsSchema = z.object({
  /** Memory budget for finished generation results, in MB */
  historySize: z.number().int().min(0).max(HISTORY_LIMITS.MAX_SIZE_MB).default(HISTORY_LIMITS.DEFAULT_SIZE_MB),
  selectionGrow: percentSchema.default(SELECTION_LIMITS.DEFAULT_PERCENT),
  selectionFeather: percentSchema.default(SELECTION_LIMITS.DEFAULT_PERCENT),
  selectionPadding: percentSchema.default(SELECTION_LIMITS.DEFAULT_PERCENT),
  /** Show the control end weighting slider */
  showControlEnd: z.boolean().default(false),
});

export type SettingsValues = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;
export type SettingsKey = keyof SettingsValues;
