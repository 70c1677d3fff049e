export {
  BYTES_PER_MB,
  HISTORY_LIMITS,
  SELECTION_LIMITS,
  INPAINT_CONTEXT,
  UPSCALE_DEFAULTS,
  LIVE_DEFAULTS,
  LAYER_PREFIXES,
} from './limits';

export type { ControlMode, ControlModeInfo } from './control-modes';
export {
  CONTROL_MODES,
  CONTROL_MODE_INFO,
  REFERENCE_ONLY_MODES,
  COMPOSITED_MODES,
  controlModeFilenames,
} from './control-modes';
