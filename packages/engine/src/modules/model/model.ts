import { Logger } from '@nestjs/common';
import { createId } from '@paralleldrive/cuid2';
import { Subscription, map, merge } from 'rxjs';
import type { Observable } from 'rxjs';
import {
  COMPOSITED_MODES,
  LAYER_PREFIXES,
  SELECTION_LIMITS,
  applyCrop,
  boundsFromExtent,
  computeBounds,
  extentOf,
  filterSupportedStyles,
  minimumSize,
  parseOpenPose,
  poseToSvg,
  relativeTo,
} from '@layerforge/shared';
import type { Bounds, ControlMode, Style } from '@layerforge/shared';
import { PreconditionError, describeError, reportErrors } from '../../common/errors';
import type { ErrorSink } from '../../common/errors';
import { Property } from '../../common/reactive/property';
import type { Settings } from '../../config/settings';
import { ControlLayerList } from '../control/control-layer-list';
import type { ControlLayer, ControlLayerHost } from '../control/control-layer';
import type {
  BackendClient,
  ClientMessage,
  Connection,
  HostDocument,
  HostLayer,
  Image,
  LayerObserver,
  Mask,
  StyleCatalog,
} from '../host/host.types';
import type { Job } from '../job/job';
import { JobQueue } from '../job/job-queue';
import {
  buildControlImageRequest,
  buildGenerationRequest,
  buildLiveRequest,
  buildUpscaleRequest,
} from '../workflow/workflow.builder';
import type { Conditioning, WorkflowRequest } from '../workflow/workflow.types';
import { LiveParams, UpscaleParams } from './params';
import type { Workspace } from './params';

/** Asynchronous submission started by one of the dispatch operations */
export interface DispatchHandle {
  readonly id: string;
  readonly signal: AbortSignal;
  /** Settles once submission finished or failed; never rejects */
  readonly done: Promise<void>;
}

export interface CancelOptions {
  /** Interrupt the job the server is executing */
  active?: boolean;
  /** Drop jobs waiting on the server */
  queued?: boolean;
  /** Abort submissions that have not received a job id yet */
  pending?: boolean;
}

/**
 * Diffusion workflows for one document.
 *
 * Holds every input related to image generation, launches generation jobs,
 * and reconciles server messages with the job queue and the document.
 */
export class Model implements ControlLayerHost, ErrorSink {
  private readonly logger = new Logger(Model.name);

  readonly workspace = new Property<Workspace>('generation');
  readonly style: Property<Style>;
  readonly prompt = new Property<string>('');
  readonly negativePrompt = new Property<string>('');
  readonly strength = new Property<number>(1.0);
  readonly progress = new Property<number>(0);
  readonly error = new Property<string>('');
  readonly canApplyResult = new Property<boolean>(false);
  readonly hasErrorChanged$: Observable<boolean>;

  readonly jobs: JobQueue;
  readonly control: ControlLayerList;
  readonly upscale: UpscaleParams;
  readonly live = new LiveParams();

  private previewLayer: HostLayer | null = null;
  private liveResult: Image | null = null;
  private readonly pending = new Map<string, AbortController>();
  private _task: DispatchHandle | null = null;
  private readonly subscriptions = new Subscription();

  constructor(
    readonly document: HostDocument,
    readonly connection: Connection,
    readonly settings: Settings,
    styles: StyleCatalog,
  ) {
    this.style = new Property(styles.default);
    this.jobs = new JobQueue(settings);
    this.control = new ControlLayerList(this);
    this.upscale = new UpscaleParams(() => this.document.extent);
    this.hasErrorChanged$ = this.error.changed$.pipe(map((message) => message !== ''));

    this.subscriptions.add(
      merge(this.jobs.jobFinished$, this.jobs.selectionChanged$).subscribe(() => this.updatePreview()),
    );

    const client = connection.clientIfConnected;
    if (client) {
      this.style.value = filterSupportedStyles(styles.list(), client.models)[0] ?? this.style.value;
      this.upscale.upscaler = client.models.defaultUpscaler;
    }
  }

  /** Enqueue image generation for the current setup */
  generate(): void {
    this.attempt(() => {
      if (!this.checkColorMode()) return;

      const extent = this.document.extent;
      const strength = this.strength.value;
      const { mask, selectionBounds } = this.document.createMaskFromSelection({
        grow: this.settings.get('selectionGrow') / 100,
        feather: this.settings.get('selectionFeather') / 100,
        padding: this.settings.get('selectionPadding') / 100,
      });
      const imageBounds = computeBounds(extent, mask?.bounds, strength);
      const image = mask || strength < 1 ? this.getCurrentImage(imageBounds) : undefined;
      const area = selectionBounds
        ? minimumSize(applyCrop(selectionBounds, imageBounds), SELECTION_LIMITS.MIN_TILE_SIZE, extentOf(imageBounds))
        : undefined;

      const conditioning: Conditioning = {
        prompt: this.prompt.value,
        negativePrompt: this.negativePrompt.value,
        control: this.control.map((c) => c.getImage(imageBounds)),
        area: strength === 1 ? area : undefined,
      };
      const style = this.style.value;

      this.clearError();
      this.dispatch((signal) => this.submitGeneration(signal, style, imageBounds, conditioning, strength, image, mask));
    });
  }

  upscaleImage(): void {
    this.attempt(() => {
      const image = this.document.getImage(boundsFromExtent(this.document.extent));
      const params = this.upscale.clone();
      const job = this.jobs.addUpscale(boundsFromExtent(params.targetExtent));
      const style = this.style.value;

      this.clearError();
      this.dispatch((signal) => this.submitUpscale(signal, job, image, params, style));
    });
  }

  generateLive(): void {
    this.attempt(() => {
      const bounds = boundsFromExtent(this.document.extent);
      const strength = this.live.strength;
      const image = strength < 1 ? this.getCurrentImage(bounds) : undefined;
      const conditioning: Conditioning = {
        prompt: this.prompt.value,
        negativePrompt: this.negativePrompt.value,
        control: this.control.map((c) => c.getImage(bounds)),
      };
      const job = this.jobs.addLive(this.prompt.value, bounds);
      const request = buildLiveRequest(
        this.style.value,
        extentOf(bounds),
        conditioning,
        image,
        strength,
        this.live.options(),
      );

      this.clearError();
      this.dispatch((signal) => this.submitJob(signal, job, request));
    });
  }

  generateControlLayer(control: ControlLayer): Job | undefined {
    return this.attempt(() => {
      if (!this.checkColorMode()) return undefined;

      const image = this.document.getImage(boundsFromExtent(this.document.extent));
      const job = this.jobs.addControl(control, boundsFromExtent(image.extent));
      const mode: ControlMode = control.mode.value;

      this.clearError();
      this.dispatch((signal) => this.submitJob(signal, job, buildControlImageRequest(image, mode)));
      return job;
    });
  }

  cancel({ active = false, queued = false, pending = false }: CancelOptions = {}): void {
    if (pending) {
      for (const [id, controller] of this.pending) {
        this.logger.log(`Aborting dispatch ${id}`);
        controller.abort();
      }
    }
    if (queued) {
      const toRemove = [...this.jobs].filter((job) => job.state === 'queued');
      if (toRemove.length > 0) {
        void reportErrors(this, this.connection.clearQueue());
        for (const job of toRemove) {
          this.jobs.notifyCancelled(job);
          this.jobs.remove(job);
        }
      }
    }
    if (active && this.jobs.anyExecuting()) {
      void reportErrors(this, this.connection.interrupt());
    }
  }

  reportProgress(value: number): void {
    this.progress.value = value;
  }

  reportError(message: string): void {
    this.error.value = message;
    this.live.isActive = false;
  }

  clearError(): void {
    this.error.value = '';
  }

  /** Apply one server event to the job it belongs to. Never throws. */
  handleMessage(message: ClientMessage): void {
    const job = this.jobs.find(message.jobId);
    if (!job) {
      this.logger.error(`Received ${message.event} message for unknown job ${message.jobId}`);
      return;
    }

    try {
      switch (message.event) {
        case 'progress':
          this.jobs.notifyStarted(job);
          this.reportProgress(message.progress);
          break;
        case 'finished':
          this.finishJob(job, message.images ?? [], message.result);
          break;
        case 'interrupted':
          this.jobs.notifyCancelled(job);
          this.reportProgress(0);
          break;
        case 'error':
          this.jobs.notifyCancelled(job);
          this.reportError(`Server execution error: ${message.error}`);
          break;
      }
    } catch (err) {
      this.reportError(describeError(err));
    }
  }

  /** Show the selected result in the preview layer, or hide it when nothing is selected */
  updatePreview(): void {
    const selection = this.jobs.selection;
    const job = selection ? this.jobs.find(selection.jobId) : undefined;
    const image = selection && job ? job.results[selection.index] : undefined;
    if (job && image) {
      this.displayResult(job, image, 'Preview');
      this.canApplyResult.value = true;
    } else {
      this.hidePreview();
      this.canApplyResult.value = false;
    }
  }

  showPreview(jobId: string, index: number, namePrefix = 'Preview'): void {
    const job = this.jobs.find(jobId);
    const image = job?.results[index];
    if (!job || !image) {
      throw new PreconditionError(`Cannot show preview, no result ${index} for job ${jobId}`);
    }
    this.displayResult(job, image, namePrefix);
  }

  hidePreview(): void {
    if (this.previewLayer) {
      this.document.hideLayer(this.previewLayer);
    }
  }

  /** Promote the preview layer to a regular layer */
  applyCurrentResult(): void {
    const layer = this.previewLayer;
    if (!layer || !this.canApplyResult.value) {
      throw new PreconditionError('There is no result to apply');
    }
    layer.setLocked(false);
    layer.setName(layer.name.replace(LAYER_PREFIXES.PREVIEW, LAYER_PREFIXES.GENERATED));
    this.previewLayer = null;
    this.canApplyResult.value = false;
  }

  addLiveLayer(): HostLayer {
    if (!this.liveResult) {
      throw new PreconditionError('There is no live result to add');
    }
    return this.document.insertLayer(
      `${LAYER_PREFIXES.LIVE} ${this.prompt.value}`,
      this.liveResult,
      boundsFromExtent(this.document.extent),
    );
  }

  setWorkspace(workspace: Workspace): void {
    if (this.workspace.value === 'live') {
      this.live.isActive = false;
    }
    this.workspace.value = workspace;
  }

  dispose(): void {
    this.subscriptions.unsubscribe();
    this.control.dispose();
    for (const controller of this.pending.values()) {
      controller.abort();
    }
  }

  /** Finished jobs kept as history, oldest first */
  get history(): Job[] {
    return [...this.jobs].filter((job) => job.state === 'finished');
  }

  get preview(): HostLayer | null {
    return this.previewLayer;
  }

  get liveImage(): Image | null {
    return this.liveResult;
  }

  get hasLiveResult(): boolean {
    return this.liveResult !== null;
  }

  get hasError(): boolean {
    return this.error.value !== '';
  }

  /** Most recent submission */
  get task(): DispatchHandle | null {
    return this._task;
  }

  get imageLayers(): LayerObserver {
    return this.document.layers;
  }

  get isActive(): boolean {
    return this.document.isActive;
  }

  get isValid(): boolean {
    return this.document.isValid;
  }

  private async submitGeneration(
    signal: AbortSignal,
    style: Style,
    bounds: Bounds,
    conditioning: Conditioning,
    strength: number,
    image: Image | undefined,
    mask: Mask | undefined,
  ): Promise<void> {
    const client = this.connection.client;
    if (!this.jobs.anyExecuting()) {
      this.progress.value = 0;
    }

    // Results are inserted at the mask position; the workflow wants the mask relative to the input image
    let target = bounds;
    let inputMask = mask;
    if (mask) {
      target = mask.bounds;
      inputMask = { ...mask, bounds: relativeTo(mask.bounds, bounds) };
    }

    const request = buildGenerationRequest({
      style,
      extent: extentOf(bounds),
      conditioning,
      strength,
      image,
      mask: inputMask,
    });
    const jobId = await this.enqueue(client, request, signal);
    if (jobId === null) return;
    const job = this.jobs.add('diffusion', conditioning.prompt, target);
    job.assignId(jobId);
  }

  private async submitUpscale(
    signal: AbortSignal,
    job: Job,
    image: Image,
    params: UpscaleParams,
    style: Style,
  ): Promise<void> {
    const client = this.connection.client;
    if (params.upscaler === '') {
      params.upscaler = client.models.defaultUpscaler;
    }
    await this.submitJob(signal, job, buildUpscaleRequest(image, params, style), client);
  }

  /** Enqueue work for a job registered ahead of submission */
  private async submitJob(
    signal: AbortSignal,
    job: Job,
    request: WorkflowRequest,
    client: BackendClient = this.connection.client,
  ): Promise<void> {
    const jobId = await this.enqueue(client, request, signal);
    if (jobId === null) {
      this.jobs.notifyCancelled(job);
      this.jobs.remove(job);
      return;
    }
    job.assignId(jobId);
  }

  /** Submit a request; null when the dispatch was aborted, whether or not the client honoured the signal */
  private async enqueue(client: BackendClient, request: WorkflowRequest, signal: AbortSignal): Promise<string | null> {
    let jobId: string;
    try {
      jobId = await client.enqueue(request, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
      this.logger.log('Submission aborted before the server assigned a job id');
      return null;
    }
    if (signal.aborted) {
      this.logger.log(`Dropping job ${jobId}, its dispatch was aborted`);
      return null;
    }
    return jobId;
  }

  private dispatch(work: (signal: AbortSignal) => Promise<void>): DispatchHandle {
    const id = createId();
    const controller = new AbortController();
    this.pending.set(id, controller);
    const done = reportErrors(this, work(controller.signal)).then(() => {
      this.pending.delete(id);
    });
    const handle: DispatchHandle = { id, signal: controller.signal, done };
    this._task = handle;
    this.logger.debug(`Dispatched ${id}`);
    return handle;
  }

  /** Run a synchronous step of an operation, reporting instead of throwing */
  private attempt<T>(action: () => T): T | undefined {
    try {
      return action();
    } catch (err) {
      this.reportError(describeError(err));
      return undefined;
    }
  }

  private checkColorMode(): boolean {
    const { ok, message } = this.document.checkColorMode();
    if (!ok) {
      this.reportError(message ?? 'The document color mode is not supported');
    }
    return ok;
  }

  /** Composited canvas without control inputs and without the preview */
  private getCurrentImage(bounds: Bounds): Image {
    const exclude: HostLayer[] = [];
    for (const control of this.control) {
      if (COMPOSITED_MODES.includes(control.mode.value)) continue;
      const layer = this.imageLayers.find(control.layerId.value);
      if (layer) {
        exclude.push(layer);
      }
    }
    if (this.previewLayer) {
      exclude.push(this.previewLayer);
    }
    return this.document.getImage(bounds, exclude);
  }

  private finishJob(job: Job, images: readonly Image[], result: unknown): void {
    if (images.length > 0) {
      this.jobs.setResults(job, images);
    }
    try {
      switch (job.kind) {
        case 'control_layer':
          this.insertControlLayer(job, result);
          break;
        case 'upscaling':
          this.insertUpscaleLayer(job);
          break;
        case 'live_preview':
          this.liveResult = job.results[0] ?? this.liveResult;
          break;
        case 'diffusion':
          break;
      }
    } catch (err) {
      // The result cannot be used, the job must not stay executing
      this.jobs.notifyCancelled(job);
      this.jobs.remove(job);
      this.progress.value = 0;
      throw err;
    }

    this.progress.value = 1;
    this.jobs.notifyFinished(job);
    if (job.kind !== 'diffusion') {
      this.jobs.remove(job);
    } else if (this.previewLayer === null && job.id) {
      this.jobs.select(job.id, 0);
    }
  }

  private insertControlLayer(job: Job, result: unknown): void {
    const control = job.control;
    if (!control) {
      throw new PreconditionError(`Control layer job ${job.id ?? ''} has no control layer`);
    }
    const below = this.previewLayer ?? undefined;
    const pose = control.mode.value === 'pose' ? parseOpenPose(result) : null;
    const image = job.results[0];

    let layer: HostLayer;
    if (pose) {
      layer = this.document.insertVectorLayer(job.prompt, poseToSvg(pose, extentOf(job.bounds)), below);
    } else if (image) {
      layer = this.document.insertLayer(job.prompt, image, job.bounds, below);
    } else {
      // Execution was cached on the server and produced no image
      layer = this.document.activeLayer;
    }
    control.layerId.value = layer.id;
  }

  private insertUpscaleLayer(job: Job): void {
    const image = job.results[0];
    if (!image) {
      throw new PreconditionError('Upscaling job did not produce an image');
    }
    if (this.previewLayer) {
      this.previewLayer.remove();
      this.previewLayer = null;
    }
    this.document.insertLayer(job.prompt, image, job.bounds);
    this.document.resize(extentOf(job.bounds));
  }

  private displayResult(job: Job, image: Image, namePrefix: string): void {
    const name = `[${namePrefix}] ${job.prompt}`;
    if (this.previewLayer && !this.previewLayer.isAttached()) {
      this.previewLayer = null;
    }
    if (this.previewLayer) {
      this.previewLayer.setName(name);
      this.document.setLayerContent(this.previewLayer, image, job.bounds);
    } else {
      this.previewLayer = this.document.insertLayer(name, image, job.bounds);
      this.previewLayer.setLocked(true);
    }
  }
}
