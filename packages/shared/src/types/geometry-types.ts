/** Width and height in pixels */
export interface Extent {
  width: number;
  height: number;
}

/** Axis-aligned rectangle in document pixel coordinates */
export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}
