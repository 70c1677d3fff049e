import type { Bounds, Extent } from '../types/geometry-types';
import { INPAINT_CONTEXT } from '../constants/limits';

/**
 * Bounds covering a whole document of the given extent
 */
export function boundsFromExtent(extent: Extent): Bounds {
  return { x: 0, y: 0, width: extent.width, height: extent.height };
}

export function extentOf(bounds: Bounds): Extent {
  return { width: bounds.width, height: bounds.height };
}

export function isEmptyBounds(bounds: Bounds): boolean {
  return bounds.width <= 0 || bounds.height <= 0;
}

/**
 * Scale an extent by a factor, rounding to whole pixels: (512x384, 2) → 1024x768
 */
export function scaleExtent(extent: Extent, factor: number): Extent {
  return {
    width: Math.round(extent.width * factor),
    height: Math.round(extent.height * factor),
  };
}

/**
 * Express bounds relative to the top-left corner of `origin`
 */
export function relativeTo(bounds: Bounds, origin: Bounds): Bounds {
  return {
    x: bounds.x - origin.x,
    y: bounds.y - origin.y,
    width: bounds.width,
    height: bounds.height,
  };
}

/**
 * Intersect bounds with a crop area; the result is relative to the crop origin
 */
export function applyCrop(bounds: Bounds, crop: Bounds): Bounds {
  const left = Math.max(bounds.x, crop.x);
  const top = Math.max(bounds.y, crop.y);
  const right = Math.min(bounds.x + bounds.width, crop.x + crop.width);
  const bottom = Math.min(bounds.y + bounds.height, crop.y + crop.height);
  return {
    x: left - crop.x,
    y: top - crop.y,
    width: Math.max(0, right - left),
    height: Math.max(0, bottom - top),
  };
}

/**
 * Grow bounds to at least `min` per side without leaving `[0, maxExtent]`.
 * Bounds near the far edge are shifted back inside.
 */
export function minimumSize(bounds: Bounds, min: number, maxExtent: Extent): Bounds {
  const width = Math.min(Math.max(bounds.width, min), maxExtent.width);
  const height = Math.min(Math.max(bounds.height, min), maxExtent.height);
  return {
    x: Math.max(0, Math.min(bounds.x, maxExtent.width - width)),
    y: Math.max(0, Math.min(bounds.y, maxExtent.height - height)),
    width,
    height,
  };
}

/**
 * Pad bounds on every side, then round the size up to a multiple of `multiple`
 */
export function padBounds(bounds: Bounds, padding: number, multiple = 1): Bounds {
  const roundUp = (n: number): number => Math.ceil(n / multiple) * multiple;
  return {
    x: bounds.x - padding,
    y: bounds.y - padding,
    width: roundUp(bounds.width + 2 * padding),
    height: roundUp(bounds.height + 2 * padding),
  };
}

/**
 * Restrict bounds to the document area
 */
export function clampBounds(bounds: Bounds, extent: Extent): Bounds {
  const x = Math.min(Math.max(bounds.x, 0), extent.width);
  const y = Math.min(Math.max(bounds.y, 0), extent.height);
  const right = Math.min(bounds.x + bounds.width, extent.width);
  const bottom = Math.min(bounds.y + bounds.height, extent.height);
  return { x, y, width: Math.max(0, right - x), height: Math.max(0, bottom - y) };
}

/**
 * Area of the document used as diffusion input.
 *
 * Without a mask the whole document is used. Refining a masked region
 * (strength < 1) uses only the mask area. Full-strength inpainting adds
 * surrounding context so the result blends with its neighbourhood.
 */
export function computeBounds(extent: Extent, maskBounds: Bounds | undefined, strength: number): Bounds {
  if (!maskBounds) {
    return boundsFromExtent(extent);
  }
  if (strength < 1) {
    return { ...maskBounds };
  }
  const longestSide = Math.max(extent.width, extent.height);
  const averageSide = Math.floor((maskBounds.width + maskBounds.height) / 2);
  const padding = Math.max(
    Math.floor(longestSide / INPAINT_CONTEXT.LONGEST_SIDE_DIVISOR),
    Math.floor(averageSide / 2),
  );
  return clampBounds(padBounds(maskBounds, padding, INPAINT_CONTEXT.ALIGNMENT), extent);
}
