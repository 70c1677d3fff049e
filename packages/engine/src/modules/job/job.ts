import type { Bounds } from '@layerforge/shared';
import { PreconditionError } from '../../common/errors';
import type { Image } from '../host/host.types';
import type { ControlLayer } from '../control/control-layer';

export const JOB_KINDS = ['diffusion', 'control_layer', 'upscaling', 'live_preview'] as const;
export type JobKind = (typeof JOB_KINDS)[number];

export const JOB_STATES = ['queued', 'executing', 'finished', 'cancelled'] as const;
export type JobState = (typeof JOB_STATES)[number];

/** One generation request submitted to the backend */
export class Job {
  readonly timestamp = new Date();
  private _id: string | null;
  private _state: JobState = 'queued';
  private _results: readonly Image[] = [];

  constructor(
    id: string | null,
    readonly kind: JobKind,
    readonly prompt: string,
    readonly bounds: Bounds,
    /** Control layer that requested the job, only for `control_layer` jobs */
    readonly control: ControlLayer | null = null,
  ) {
    this._id = id;
  }

  /** Server-assigned id, null until the backend accepted the job */
  get id(): string | null {
    return this._id;
  }

  get state(): JobState {
    return this._state;
  }

  get results(): readonly Image[] {
    return this._results;
  }

  /** Memory held by the results, in bytes */
  get resultSize(): number {
    return this._results.reduce((total, image) => total + image.size, 0);
  }

  assignId(id: string): void {
    if (this._id !== null) {
      throw new PreconditionError(`Job ${this._id} already has an id, cannot assign ${id}`);
    }
    this._id = id;
  }

  /** @internal state transitions go through JobQueue */
  setState(state: JobState): void {
    this._state = state;
  }

  /** @internal use JobQueue.setResults, which also accounts their memory */
  attachResults(results: readonly Image[]): void {
    this._results = results;
  }
}
