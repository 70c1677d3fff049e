export { validateEnv } from './config/env.config';
export type { EnvConfig } from './config/env.config';
export { configureLogging } from './config/logging.config';
export { Settings } from './config/settings';
export type { SettingsChange } from './config/settings';

export { NetworkError, PreconditionError, describeError, reportErrors } from './common/errors';
export type { ErrorSink } from './common/errors';
export { Property } from './common/reactive/property';

export { LAYER_TYPES, CONNECTION_STATES } from './modules/host/host.types';
export type {
  Image,
  Mask,
  LayerType,
  HostLayer,
  LayerObserver,
  SelectionMaskOptions,
  SelectionMask,
  ColorModeCheck,
  HostDocument,
  EnqueueOptions,
  BackendClient,
  ConnectionState,
  Connection,
  StyleCatalog,
  ClientMessage,
  ClientEvent,
} from './modules/host/host.types';

export { Job, JOB_KINDS, JOB_STATES } from './modules/job/job';
export type { JobKind, JobState } from './modules/job/job';
export { JobQueue } from './modules/job/job-queue';
export type { JobSelection } from './modules/job/job-queue';

export { ControlLayer } from './modules/control/control-layer';
export type { ControlLayerHost } from './modules/control/control-layer';
export { ControlLayerList } from './modules/control/control-layer-list';

export { GENERATION_KINDS } from './modules/workflow/workflow.types';
export type {
  Control,
  Conditioning,
  LiveOptions,
  GenerationKind,
  UpscaleOptions,
  WorkflowRequest,
  WorkflowKind,
} from './modules/workflow/workflow.types';
export {
  chooseGenerationKind,
  buildGenerationRequest,
  buildLiveRequest,
  buildUpscaleRequest,
  buildControlImageRequest,
} from './modules/workflow/workflow.builder';
export type { GenerationInputs } from './modules/workflow/workflow.builder';

export { Model } from './modules/model/model';
export type { DispatchHandle, CancelOptions } from './modules/model/model';
export { UpscaleParams, LiveParams, WORKSPACES } from './modules/model/params';
export type { Workspace } from './modules/model/params';
