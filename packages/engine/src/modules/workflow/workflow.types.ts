import type { Bounds, ControlMode, Extent, Style } from '@layerforge/shared';
import type { Image, Mask } from '../host/host.types';

/** One auxiliary conditioning input */
export interface Control {
  mode: ControlMode;
  image: Image;
  strength: number;
  end: number;
}

/** Prompt text plus control inputs guiding a generation */
export interface Conditioning {
  prompt: string;
  negativePrompt: string;
  control: Control[];
  /** Region the prompt applies to, relative to the input image */
  area?: Bounds;
}

/** Options that turn a regular generation into a fast live preview */
export interface LiveOptions {
  seed: number;
}

export const GENERATION_KINDS = ['generate', 'refine', 'inpaint', 'refine_region'] as const;
export type GenerationKind = (typeof GENERATION_KINDS)[number];

export interface UpscaleOptions {
  upscaler: string;
  factor: number;
  useDiffusion: boolean;
  strength: number;
}

export type WorkflowRequest =
  | { kind: 'generate'; style: Style; extent: Extent; conditioning: Conditioning; live?: LiveOptions }
  | { kind: 'refine'; style: Style; image: Image; conditioning: Conditioning; strength: number; live?: LiveOptions }
  | { kind: 'inpaint'; style: Style; image: Image; mask: Mask; conditioning: Conditioning }
  | {
      kind: 'refine_region';
      style: Style;
      image: Image;
      mask: Mask;
      conditioning: Conditioning;
      strength: number;
    }
  | { kind: 'upscale_simple'; image: Image; upscaler: string; factor: number }
  | { kind: 'upscale_tiled'; image: Image; upscaler: string; factor: number; style: Style; strength: number }
  | { kind: 'control_image'; image: Image; mode: ControlMode };

export type WorkflowKind = WorkflowRequest['kind'];
