import { LIVE_DEFAULTS, UPSCALE_DEFAULTS, scaleExtent } from '@layerforge/shared';
import type { Extent } from '@layerforge/shared';
import type { LiveOptions, UpscaleOptions } from '../workflow/workflow.types';

export const WORKSPACES = ['generation', 'upscaling', 'live'] as const;
export type Workspace = (typeof WORKSPACES)[number];

export class UpscaleParams implements UpscaleOptions {
  /** Empty selects the server's default upscaler */
  upscaler = '';
  factor: number = UPSCALE_DEFAULTS.FACTOR;
  useDiffusion: boolean = UPSCALE_DEFAULTS.USE_DIFFUSION;
  strength: number = UPSCALE_DEFAULTS.STRENGTH;

  constructor(private readonly documentExtent: () => Extent) {}

  get targetExtent(): Extent {
    return scaleExtent(this.documentExtent(), this.factor);
  }

  clone(): UpscaleParams {
    const copy = new UpscaleParams(this.documentExtent);
    copy.upscaler = this.upscaler;
    copy.factor = this.factor;
    copy.useDiffusion = this.useDiffusion;
    copy.strength = this.strength;
    return copy;
  }
}

export class LiveParams {
  isActive = false;
  strength: number = LIVE_DEFAULTS.STRENGTH;
  seed = Math.floor(Math.random() * LIVE_DEFAULTS.MAX_SEED);

  options(): LiveOptions {
    return { seed: this.seed };
  }
}
