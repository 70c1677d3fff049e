import type { ControlMode } from '../constants/control-modes';

/** Stable Diffusion architecture a checkpoint belongs to */
export const SD_VERSIONS = ['sd15', 'sdxl'] as const;
export type SdVersion = (typeof SD_VERSIONS)[number];

/** Generation preset: checkpoint plus its architecture, `auto` to look it up on the server */
export interface Style {
  filename: string;
  name: string;
  sdVersion: SdVersion | 'auto';
  checkpoint: string;
}

export interface CheckpointInfo {
  filename: string;
  sdVersion: SdVersion;
}

/** Models installed on the backend, as reported after connecting */
export interface ClientModels {
  checkpoints: Record<string, CheckpointInfo>;
  /** IP-Adapter model per architecture, null when missing */
  ipAdapter: Record<SdVersion, string | null>;
  /** ControlNet model per mode and architecture, null when missing */
  control: Record<ControlMode, Record<SdVersion, string | null>>;
  upscalers: string[];
  defaultUpscaler: string;
}
