export {
  boundsFromExtent,
  extentOf,
  isEmptyBounds,
  scaleExtent,
  relativeTo,
  applyCrop,
  minimumSize,
  padBounds,
  clampBounds,
  computeBounds,
} from './bounds-utils';

export { resolveSdVersion, filterSupportedStyles } from './style-utils';

export { POSE_LIMBS, parseOpenPose, poseToSvg } from './pose-utils';
