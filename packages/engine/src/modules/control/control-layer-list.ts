import { Subject } from 'rxjs';
import type { Observable, Subscription } from 'rxjs';
import type { ControlMode } from '@layerforge/shared';
import { ControlLayer } from './control-layer';
import type { ControlLayerHost } from './control-layer';

/**
 * Control layers of one document, in the order they were added.
 * Entries whose backing layer disappears from the document are dropped.
 */
export class ControlLayerList implements Iterable<ControlLayer> {
  private readonly layers: ControlLayer[] = [];
  private readonly modeSubscriptions = new Map<ControlLayer, Subscription>();
  /** New control layers start with the mode last picked by the user */
  private lastMode: ControlMode = 'scribble';
  private readonly layerSubscription: Subscription;

  private readonly additions = new Subject<ControlLayer>();
  private readonly removals = new Subject<ControlLayer>();
  readonly added$: Observable<ControlLayer> = this.additions.asObservable();
  readonly removed$: Observable<ControlLayer> = this.removals.asObservable();

  constructor(private readonly host: ControlLayerHost) {
    this.layerSubscription = host.imageLayers.changed$.subscribe(() => this.updateLayerList());
  }

  /** Add a control layer backed by the document's active layer */
  add(): ControlLayer {
    const control = new ControlLayer(this.host, this.lastMode, this.host.document.activeLayer.id);
    this.modeSubscriptions.set(
      control,
      control.mode.changed$.subscribe((mode) => {
        this.lastMode = mode;
      }),
    );
    this.layers.push(control);
    this.additions.next(control);
    return control;
  }

  remove(control: ControlLayer): void {
    const index = this.layers.indexOf(control);
    if (index < 0) return;
    this.layers.splice(index, 1);
    this.modeSubscriptions.get(control)?.unsubscribe();
    this.modeSubscriptions.delete(control);
    control.dispose();
    this.removals.next(control);
  }

  map<T>(fn: (control: ControlLayer) => T): T[] {
    return this.layers.map(fn);
  }

  get length(): number {
    return this.layers.length;
  }

  at(index: number): ControlLayer | undefined {
    return this.layers[index];
  }

  [Symbol.iterator](): Iterator<ControlLayer> {
    return this.layers[Symbol.iterator]();
  }

  dispose(): void {
    this.layerSubscription.unsubscribe();
    for (const control of [...this.layers]) {
      this.remove(control);
    }
  }

  private updateLayerList(): void {
    const layerIds = new Set(this.host.imageLayers.list().map((l) => l.id));
    const deleted = this.layers.filter((c) => !layerIds.has(c.layerId.value));
    for (const control of deleted) {
      this.remove(control);
    }
  }
}
