import type { ControlMode, Extent, Style } from '@layerforge/shared';
import { PreconditionError } from '../../common/errors';
import type { Image, Mask } from '../host/host.types';
import type {
  Conditioning,
  GenerationKind,
  LiveOptions,
  UpscaleOptions,
  WorkflowRequest,
} from './workflow.types';

/**
 * Pick the workflow for a generation from what the user provided.
 *
 * | mask | strength | workflow      |
 * |------|----------|---------------|
 * | no   | 1.0      | generate      |
 * | no   | < 1.0    | refine        |
 * | yes  | 1.0      | inpaint       |
 * | yes  | < 1.0    | refine_region |
 */
export function chooseGenerationKind(inputs: { hasMask: boolean; strength: number }): GenerationKind {
  const full = inputs.strength >= 1;
  if (!inputs.hasMask) {
    return full ? 'generate' : 'refine';
  }
  return full ? 'inpaint' : 'refine_region';
}

export interface GenerationInputs {
  style: Style;
  /** Size of the generated area */
  extent: Extent;
  conditioning: Conditioning;
  strength: number;
  image?: Image;
  /** Mask with bounds relative to `image` */
  mask?: Mask;
}

function requireImage(image: Image | undefined, kind: GenerationKind): Image {
  if (!image) {
    throw new PreconditionError(`Workflow ${kind} requires an input image`);
  }
  return image;
}

function requireMask(mask: Mask | undefined, kind: GenerationKind): Mask {
  if (!mask) {
    throw new PreconditionError(`Workflow ${kind} requires a mask`);
  }
  return mask;
}

export function buildGenerationRequest(inputs: GenerationInputs): WorkflowRequest {
  const { style, extent, conditioning, strength, image, mask } = inputs;
  const kind = chooseGenerationKind({ hasMask: mask !== undefined, strength });
  switch (kind) {
    case 'generate':
      return { kind, style, extent, conditioning };
    case 'refine':
      return { kind, style, image: requireImage(image, kind), conditioning, strength };
    case 'inpaint':
      return { kind, style, image: requireImage(image, kind), mask: requireMask(mask, kind), conditioning };
    case 'refine_region':
      return {
        kind,
        style,
        image: requireImage(image, kind),
        mask: requireMask(mask, kind),
        conditioning,
        strength,
      };
  }
}

/** Live previews refine the canvas when strength is below 1, otherwise they start from scratch */
export function buildLiveRequest(
  style: Style,
  extent: Extent,
  conditioning: Conditioning,
  image: Image | undefined,
  strength: number,
  live: LiveOptions,
): WorkflowRequest {
  if (image) {
    return { kind: 'refine', style, image, conditioning, strength, live };
  }
  return { kind: 'generate', style, extent, conditioning, live };
}

export function buildUpscaleRequest(image: Image, options: UpscaleOptions, style: Style): WorkflowRequest {
  const { upscaler, factor } = options;
  if (options.useDiffusion) {
    return { kind: 'upscale_tiled', image, upscaler, factor, style, strength: options.strength };
  }
  return { kind: 'upscale_simple', image, upscaler, factor };
}

export function buildControlImageRequest(image: Image, mode: ControlMode): WorkflowRequest {
  return { kind: 'control_image', image, mode };
}
