export type { Extent, Bounds } from './geometry-types';

export type { SdVersion, Style, CheckpointInfo, ClientModels } from './style-types';
export { SD_VERSIONS } from './style-types';
