/** Bytes per megabyte used for history memory accounting */
export const BYTES_PER_MB = 1024 ** 2;

/** Result history retention */
export const HISTORY_LIMITS = {
  DEFAULT_SIZE_MB: 1_000,
  MAX_SIZE_MB: 64_000,
} as const;

/** Selection mask handling, percentages are relative to the selection size */
export const SELECTION_LIMITS = {
  MIN_TILE_SIZE: 64,
  DEFAULT_PERCENT: 7,
  MAX_PERCENT: 100,
} as const;

/** Context padding and alignment around an inpaint mask */
export const INPAINT_CONTEXT = {
  LONGEST_SIDE_DIVISOR: 16,
  ALIGNMENT: 8,
} as const;

export const UPSCALE_DEFAULTS = {
  FACTOR: 2.0,
  USE_DIFFUSION: true,
  STRENGTH: 0.3,
} as const;

export const LIVE_DEFAULTS = {
  STRENGTH: 0.3,
  MAX_SEED: 2 ** 31 - 1,
} as const;

/** Layer name prefixes shown in the host document */
export const LAYER_PREFIXES = {
  PREVIEW: '[Preview]',
  GENERATED: '[Generated]',
  CONTROL: '[Control]',
  UPSCALE: '[Upscale]',
  LIVE: '[Live]',
} as const;
