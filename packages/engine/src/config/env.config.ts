import { z } from 'zod';
import { HISTORY_LIMITS, SELECTION_LIMITS } from '@layerforge/shared';

const percentSchema = z.coerce.number().min(0).max(SELECTION_LIMITS.MAX_PERCENT);

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']).default('log'),
  HISTORY_SIZE_MB: z.coerce.number().int().min(0).max(HISTORY_LIMITS.MAX_SIZE_MB).default(HISTORY_LIMITS.DEFAULT_SIZE_MB),
  SELECTION_GROW: percentSchema.default(SELECTION_LIMITS.DEFAULT_PERCENT),
  SELECTION_FEATHER: percentSchema.default(SELECTION_LIMITS.DEFAULT_PERCENT),
  SELECTION_PADDING: percentSchema.default(SELECTION_LIMITS.DEFAULT_PERCENT),
  SHOW_CONTROL_END: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
