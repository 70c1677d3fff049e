import type { SdVersion } from '../types/style-types';

/** Conditioning types a control layer can supply */
export const CONTROL_MODES = [
  'image',
  'inpaint',
  'scribble',
  'line_art',
  'soft_edge',
  'canny_edge',
  'depth',
  'normal',
  'pose',
  'segmentation',
  'blur',
  'stencil',
  'hands',
] as const;
export type ControlMode = (typeof CONTROL_MODES)[number];

export interface ControlModeInfo {
  text: string;
  /** Line-based inputs are drawn on transparent layers and need a white background */
  isLines: boolean;
  /** Model filename patterns searched on the server, per architecture */
  filenames: Partial<Record<SdVersion, readonly string[]>>;
}

export const CONTROL_MODE_INFO: Record<ControlMode, ControlModeInfo> = {
  image: { text: 'Reference', isLines: false, filenames: {} },
  inpaint: {
    text: 'Inpaint',
    isLines: false,
    filenames: { sd15: ['control_v11p_sd15_inpaint', 'control_lora_rank128_v11p_sd15_inpaint'] },
  },
  scribble: {
    text: 'Scribble',
    isLines: true,
    filenames: {
      sd15: ['control_v11p_sd15_scribble', 'control_lora_rank128_v11p_sd15_scribble'],
      sdxl: ['xinsirscribble', 'scribble-sdxl', 'mistoline'],
    },
  },
  line_art: {
    text: 'Line Art',
    isLines: true,
    filenames: {
      sd15: ['control_v11p_sd15_lineart', 'control_lora_rank128_v11p_sd15_lineart'],
      sdxl: ['sai_xl_sketch_256lora', 'mistoline'],
    },
  },
  soft_edge: {
    text: 'Soft Edge',
    isLines: true,
    filenames: {
      sd15: ['control_v11p_sd15_softedge', 'control_lora_rank128_v11p_sd15_softedge'],
      sdxl: ['mistoline'],
    },
  },
  canny_edge: {
    text: 'Canny Edge',
    isLines: true,
    filenames: {
      sd15: ['control_v11p_sd15_canny', 'control_lora_rank128_v11p_sd15_canny'],
      sdxl: ['sai_xl_canny_256lora', 'xinsircanny'],
    },
  },
  depth: {
    text: 'Depth',
    isLines: false,
    filenames: {
      sd15: ['control_v11f1p_sd15_depth', 'control_lora_rank128_v11f1p_sd15_depth'],
      sdxl: ['sai_xl_depth_256lora'],
    },
  },
  normal: {
    text: 'Normal',
    isLines: false,
    filenames: { sd15: ['control_v11p_sd15_normalbae', 'control_lora_rank128_v11p_sd15_normalbae'] },
  },
  pose: {
    text: 'Pose',
    isLines: false,
    filenames: {
      sd15: ['control_v11p_sd15_openpose', 'control_lora_rank128_v11p_sd15_openpose'],
      sdxl: ['thibaud_xl_openpose', 't2i-adapter_diffusers_xl_openpose'],
    },
  },
  segmentation: {
    text: 'Segment',
    isLines: false,
    filenames: { sd15: ['control_v11p_sd15_seg', 'control_lora_rank128_v11p_sd15_seg'] },
  },
  blur: {
    text: 'Blur',
    isLines: false,
    filenames: { sd15: ['control_v11f1e_sd15_tile', 'control_lora_rank128_v11f1e_sd15_tile'] },
  },
  stencil: {
    text: 'Stencil',
    isLines: false,
    filenames: { sd15: ['control_v1p_sd15_qrcode_monster'], sdxl: ['control_v1p_sdxl_qrcode_monster'] },
  },
  hands: {
    text: 'Hands',
    isLines: false,
    filenames: { sd15: ['control_sd15_inpaint_depth_hand'] },
  },
};

/** Modes that condition a generation but never produce a derived image of their own */
export const REFERENCE_ONLY_MODES: readonly ControlMode[] = ['image', 'stencil'];

/** Modes whose layers stay part of the composited input image */
export const COMPOSITED_MODES: readonly ControlMode[] = ['image', 'blur'];

export function controlModeFilenames(mode: ControlMode, sdVersion: SdVersion): readonly string[] {
  return CONTROL_MODE_INFO[mode].filenames[sdVersion] ?? [];
}
