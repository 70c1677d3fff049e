import { Logger } from '@nestjs/common';
import { Subject } from 'rxjs';
import type { Observable } from 'rxjs';
import { BYTES_PER_MB, CONTROL_MODE_INFO, LAYER_PREFIXES } from '@layerforge/shared';
import type { Bounds } from '@layerforge/shared';
import type { Settings } from '../../config/settings';
import type { Image } from '../host/host.types';
import type { ControlLayer } from '../control/control-layer';
import { Job } from './job';
import type { JobKind, JobState } from './job';

/** Result chosen for preview */
export interface JobSelection {
  jobId: string;
  index: number;
}

/**
 * Waiting, running and finished jobs of one document, in submission order.
 *
 * Finished diffusion jobs stay in the queue as history until their results
 * exceed the `historySize` budget; other kinds are removed by the owner as
 * soon as they finish.
 */
export class JobQueue implements Iterable<Job> {
  private readonly logger = new Logger(JobQueue.name);
  private readonly entries: Job[] = [];
  private _selection: JobSelection | null = null;
  /** MB held by results of diffusion jobs in `entries` */
  private _memoryUsage = 0;

  private readonly countChanges = new Subject<void>();
  private readonly finishedJobs = new Subject<Job>();
  private readonly cancelledJobs = new Subject<Job>();
  private readonly selectionChanges = new Subject<JobSelection | null>();

  readonly countChanged$: Observable<void> = this.countChanges.asObservable();
  readonly jobFinished$: Observable<Job> = this.finishedJobs.asObservable();
  readonly jobCancelled$: Observable<Job> = this.cancelledJobs.asObservable();
  readonly selectionChanged$: Observable<JobSelection | null> = this.selectionChanges.asObservable();

  constructor(private readonly settings: Settings) {}

  add(kind: JobKind, prompt: string, bounds: Bounds, control?: ControlLayer): Job {
    const job = new Job(null, kind, prompt, bounds, control ?? null);
    this.entries.push(job);
    this.countChanges.next();
    return job;
  }

  addControl(control: ControlLayer, bounds: Bounds): Job {
    const prompt = `${LAYER_PREFIXES.CONTROL} ${CONTROL_MODE_INFO[control.mode.value].text}`;
    return this.add('control_layer', prompt, bounds, control);
  }

  addUpscale(bounds: Bounds): Job {
    return this.add('upscaling', `${LAYER_PREFIXES.UPSCALE} ${bounds.width}x${bounds.height}`, bounds);
  }

  addLive(prompt: string, bounds: Bounds): Job {
    return this.add('live_preview', prompt, bounds);
  }

  remove(job: Job): void {
    const index = this.entries.indexOf(job);
    if (index < 0) {
      this.logger.warn(`Job ${job.id ?? '(pending)'} is not in the queue`);
      return;
    }
    this.entries.splice(index, 1);
    if (job.kind === 'diffusion') {
      this.release(job);
    }
    this.countChanges.next();
  }

  find(id: string): Job | undefined {
    return this.entries.find((j) => j.id === id);
  }

  count(state: JobState): number {
    return this.entries.filter((j) => j.state === state).length;
  }

  /**
   * Attach results to a job. Diffusion results count against the history
   * budget, older jobs are pruned right away but `job` itself is kept.
   */
  setResults(job: Job, results: readonly Image[]): void {
    if (job.kind !== 'diffusion') {
      job.attachResults(results);
      return;
    }
    this.release(job);
    job.attachResults(results);
    this._memoryUsage += job.resultSize / BYTES_PER_MB;
    this.prune(job);
  }

  notifyStarted(job: Job): void {
    if (job.state !== 'queued') return;
    job.setState('executing');
    this.countChanges.next();
  }

  notifyFinished(job: Job): void {
    job.setState('finished');
    this.finishedJobs.next(job);
    this.countChanges.next();
  }

  notifyCancelled(job: Job): void {
    job.setState('cancelled');
    this.cancelledJobs.next(job);
    this.countChanges.next();
  }

  /**
   * Evict the oldest jobs while results exceed the history budget.
   * Eviction is strictly first-in first-out and stops at `keep`.
   */
  prune(keep: Job): void {
    const budget = this.settings.get('historySize');
    let evicted = 0;
    while (this._memoryUsage > budget && this.entries[0] !== undefined && this.entries[0] !== keep) {
      const discarded = this.entries.shift();
      if (!discarded) break;
      if (discarded.kind === 'diffusion') {
        this.release(discarded);
      }
      evicted++;
    }
    if (evicted > 0) {
      this.logger.log(`Pruned ${evicted} job(s) from history, ${this._memoryUsage.toFixed(1)}MB in use`);
      this.countChanges.next();
    }
  }

  /** Choose a result for preview; notifies even if the selection is unchanged */
  select(jobId: string, index: number): void {
    this.setSelection({ jobId, index });
  }

  clearSelection(): void {
    this.setSelection(null);
  }

  anyExecuting(): boolean {
    return this.entries.some((j) => j.state === 'executing');
  }

  get selection(): JobSelection | null {
    return this._selection;
  }

  /** MB held by diffusion results */
  get memoryUsage(): number {
    return this._memoryUsage;
  }

  get length(): number {
    return this.entries.length;
  }

  at(index: number): Job | undefined {
    return this.entries[index];
  }

  [Symbol.iterator](): Iterator<Job> {
    return this.entries[Symbol.iterator]();
  }

  private setSelection(selection: JobSelection | null): void {
    this._selection = selection;
    this.selectionChanges.next(selection);
  }

  private release(job: Job): void {
    this._memoryUsage = Math.max(0, this._memoryUsage - job.resultSize / BYTES_PER_MB);
  }
}
