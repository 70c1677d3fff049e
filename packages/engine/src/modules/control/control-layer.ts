import { createId } from '@paralleldrive/cuid2';
import { Subscription, filter, merge } from 'rxjs';
import {
  CONTROL_MODE_INFO,
  REFERENCE_ONLY_MODES,
  controlModeFilenames,
  isEmptyBounds,
  resolveSdVersion,
} from '@layerforge/shared';
import type { Bounds, ControlMode, Style } from '@layerforge/shared';
import { PreconditionError } from '../../common/errors';
import { Property } from '../../common/reactive/property';
import type { Settings } from '../../config/settings';
import type { Connection, HostDocument, HostLayer, LayerObserver } from '../host/host.types';
import type { Job } from '../job/job';
import type { JobQueue } from '../job/job-queue';
import type { Control } from '../workflow/workflow.types';

/** What a control layer needs from the document session that owns it */
export interface ControlLayerHost {
  readonly style: Property<Style>;
  readonly jobs: JobQueue;
  readonly connection: Connection;
  readonly settings: Settings;
  readonly document: HostDocument;
  readonly imageLayers: LayerObserver;
  generateControlLayer(control: ControlLayer): Job | undefined;
}

/**
 * A document layer used as auxiliary conditioning input.
 *
 * Derived flags are recomputed whenever one of their inputs publishes a change:
 * `isSupported`/`canGenerate` on mode, style and connection changes,
 * `isPoseVector` on mode and layer changes, `showEnd` on settings changes.
 */
export class ControlLayer {
  readonly id = createId();
  readonly mode: Property<ControlMode>;
  readonly layerId: Property<string>;
  readonly strength = new Property<number>(1.0);
  readonly end = new Property<number>(1.0);
  readonly isSupported = new Property<boolean>(true);
  readonly isPoseVector = new Property<boolean>(false);
  readonly canGenerate = new Property<boolean>(true);
  readonly hasActiveJob = new Property<boolean>(false);
  readonly showEnd = new Property<boolean>(false);
  readonly errorText = new Property<string>('');

  private generateJob: Job | null = null;
  private readonly subscriptions = new Subscription();

  constructor(
    private readonly host: ControlLayerHost,
    mode: ControlMode,
    layerId: string,
  ) {
    this.mode = new Property(mode);
    this.layerId = new Property(layerId);
    this.updateIsSupported();
    this.updateIsPoseVector();

    this.subscriptions.add(
      merge(this.mode.changed$, host.style.changed$, host.connection.stateChanged$).subscribe(() =>
        this.updateIsSupported(),
      ),
    );
    this.subscriptions.add(
      merge(this.mode.changed$, this.layerId.changed$).subscribe(() => this.updateIsPoseVector()),
    );
    this.subscriptions.add(
      merge(host.jobs.jobFinished$, host.jobs.jobCancelled$)
        .pipe(filter((job) => job === this.generateJob))
        .subscribe(() => this.updateActiveJob()),
    );
    this.subscriptions.add(
      host.settings.changed$
        .pipe(filter((change) => change.key === 'showControlEnd'))
        .subscribe(() => this.updateShowEnd()),
    );
  }

  /** Backing document layer; throws once it has been deleted */
  get layer(): HostLayer {
    const layer = this.host.imageLayers.find(this.layerId.value);
    if (!layer) {
      throw new PreconditionError('Control layer has been deleted');
    }
    return layer;
  }

  /**
   * Snapshot the layer content as conditioning input. Reference images use
   * their own layer bounds; line and stencil inputs get a white background.
   */
  getImage(bounds?: Bounds): Control {
    const layer = this.layer;
    const mode = this.mode.value;
    const useLayerBounds = mode === 'image' && !isEmptyBounds(layer.bounds);
    const image = this.host.document.getLayerImage(layer, useLayerBounds ? undefined : bounds);
    if (CONTROL_MODE_INFO[mode].isLines || mode === 'stencil') {
      image.makeOpaque('white');
    }
    return { mode, image, strength: this.strength.value, end: this.end.value };
  }

  /** Create a new control image from the current canvas */
  generate(): void {
    const job = this.host.generateControlLayer(this);
    if (job) {
      this.generateJob = job;
      this.hasActiveJob.value = true;
    }
  }

  dispose(): void {
    this.subscriptions.unsubscribe();
  }

  private updateIsSupported(): void {
    const mode = this.mode.value;
    let isSupported = true;
    let errorText = '';
    const client = this.host.connection.clientIfConnected;
    if (client) {
      const sdVersion = resolveSdVersion(this.host.style.value, client.models);
      if (mode === 'image') {
        if (client.models.ipAdapter[sdVersion] === null) {
          errorText = 'The server is missing the IP-Adapter model';
          isSupported = false;
        }
      } else if (client.models.control[mode][sdVersion] === null) {
        const filenames = controlModeFilenames(mode, sdVersion);
        errorText = filenames.length > 0
          ? `The ControlNet model is not installed ${filenames.join(', ')}`
          : `Not supported for ${sdVersion}`;
        isSupported = false;
      }
    }

    this.errorText.value = errorText;
    this.isSupported.value = isSupported;
    this.canGenerate.value = isSupported && !REFERENCE_ONLY_MODES.includes(mode);
    this.updateShowEnd();
  }

  private updateIsPoseVector(): void {
    const layer = this.host.imageLayers.find(this.layerId.value);
    this.isPoseVector.value = this.mode.value === 'pose' && layer?.type === 'vectorlayer';
  }

  private updateActiveJob(): void {
    const job = this.generateJob;
    const active = job !== null && job.state !== 'finished' && job.state !== 'cancelled';
    if (!active) {
      this.generateJob = null;
    }
    this.hasActiveJob.value = active;
  }

  private updateShowEnd(): void {
    this.showEnd.value = this.isSupported.value && this.host.settings.get('showControlEnd');
  }
}
