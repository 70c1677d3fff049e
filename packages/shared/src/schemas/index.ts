export { settingsSchema } from './settings-schema';
export type { SettingsValues, SettingsInput, SettingsKey } from './settings-schema';

export { openPoseSchema, posePersonSchema } from './pose-schema';
export type { OpenPoseInput, PosePersonInput } from './pose-schema';
