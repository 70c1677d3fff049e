import type { Observable } from 'rxjs';
import type { Bounds, ClientModels, Extent, Style } from '@layerforge/shared';
import type { WorkflowRequest } from '../workflow/workflow.types';

/**
 * Pixel data owned by the host. The engine never looks at pixels, it only
 * moves images between the document and the backend.
 */
export interface Image {
  readonly extent: Extent;
  /** Approximate memory footprint in bytes */
  readonly size: number;
  makeOpaque(background: 'white' | 'black'): void;
}

/** Selection mask; `bounds` locate it in the document or in a cropped input image */
export interface Mask {
  readonly bounds: Bounds;
  readonly data: Uint8Array;
}

export const LAYER_TYPES = ['paintlayer', 'vectorlayer', 'grouplayer', 'filelayer', 'filterlayer'] as const;
export type LayerType = (typeof LAYER_TYPES)[number];

/** Reference to a layer in the host document */
export interface HostLayer {
  readonly id: string;
  readonly type: LayerType;
  readonly bounds: Bounds;
  readonly name: string;
  readonly locked: boolean;
  /** False once the layer has been deleted from the document */
  isAttached(): boolean;
  setName(name: string): void;
  setLocked(locked: boolean): void;
  remove(): void;
}

/** Live view of the image layers in a document */
export interface LayerObserver {
  list(): readonly HostLayer[];
  find(id: string): HostLayer | undefined;
  /** Emits whenever layers are added, removed or reordered */
  readonly changed$: Observable<void>;
}

/** Fractions of the selection size */
export interface SelectionMaskOptions {
  grow: number;
  feather: number;
  padding: number;
}

export interface SelectionMask {
  mask?: Mask;
  selectionBounds?: Bounds;
}

export interface ColorModeCheck {
  ok: boolean;
  message?: string;
}

/** The document being edited in the host application */
export interface HostDocument {
  readonly extent: Extent;
  readonly activeLayer: HostLayer;
  readonly layers: LayerObserver;
  readonly isActive: boolean;
  readonly isValid: boolean;
  checkColorMode(): ColorModeCheck;
  /** Composited image of the document, without the excluded layers */
  getImage(bounds: Bounds, excludeLayers?: readonly HostLayer[]): Image;
  /** Content of one layer; its own bounds when `bounds` is omitted */
  getLayerImage(layer: HostLayer, bounds?: Bounds): Image;
  createMaskFromSelection(options: SelectionMaskOptions): SelectionMask;
  insertLayer(name: string, image: Image, bounds: Bounds, below?: HostLayer): HostLayer;
  insertVectorLayer(name: string, svg: string, below?: HostLayer): HostLayer;
  /** Replace layer pixels and make the layer visible */
  setLayerContent(layer: HostLayer, image: Image, bounds: Bounds): void;
  hideLayer(layer: HostLayer): void;
  resize(extent: Extent): void;
}

export interface EnqueueOptions {
  signal?: AbortSignal;
}

/** Protocol client for the diffusion server */
export interface BackendClient {
  readonly models: ClientModels;
  /** Submit work; resolves with the server-assigned job id */
  enqueue(request: WorkflowRequest, options?: EnqueueOptions): Promise<string>;
}

export const CONNECTION_STATES = ['disconnected', 'connecting', 'connected', 'error'] as const;
export type ConnectionState = (typeof CONNECTION_STATES)[number];

export interface Connection {
  readonly state: ConnectionState;
  readonly stateChanged$: Observable<ConnectionState>;
  readonly clientIfConnected: BackendClient | null;
  /** Throws when not connected */
  readonly client: BackendClient;
  /** Stop the job the server is currently executing */
  interrupt(): Promise<void>;
  /** Drop all jobs waiting on the server */
  clearQueue(): Promise<void>;
}

export interface StyleCatalog {
  list(): readonly Style[];
  readonly default: Style;
}

/** Events the backend client delivers for submitted jobs */
export type ClientMessage =
  | { event: 'progress'; jobId: string; progress: number }
  | { event: 'finished'; jobId: string; images?: readonly Image[]; result?: unknown }
  | { event: 'interrupted'; jobId: string }
  | { event: 'error'; jobId: string; error: string };

export type ClientEvent = ClientMessage['event'];
