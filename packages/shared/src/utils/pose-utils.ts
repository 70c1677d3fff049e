import type { Extent } from '../types/geometry-types';
import { openPoseSchema } from '../schemas/pose-schema';
import type { OpenPoseInput } from '../schemas/pose-schema';

/** Keypoint index pairs forming the limbs of the COCO-18 skeleton */
export const POSE_LIMBS: readonly (readonly [number, number])[] = [
  [1, 2], [1, 5], [2, 3], [3, 4], [5, 6], [6, 7], [1, 8], [8, 9], [9, 10],
  [1, 11], [11, 12], [12, 13], [1, 0], [0, 14], [14, 16], [0, 15], [15, 17],
];

const LIMB_COLORS = [
  '#ff0000', '#ff5500', '#ffaa00', '#ffff00', '#aaff00', '#55ff00', '#00ff00', '#00ff55', '#00ffaa',
  '#00ffff', '#00aaff', '#0055ff', '#0000ff', '#5500ff', '#aa00ff', '#ff00ff', '#ff00aa',
];

interface Keypoint {
  x: number;
  y: number;
}

/**
 * Validate a pose preprocessor result; returns null for anything that isn't OpenPose JSON
 */
export function parseOpenPose(raw: unknown): OpenPoseInput | null {
  const result = openPoseSchema.safeParse(raw);
  return result.success ? result.data : null;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function keypointsOf(flat: readonly number[], scaleX: number, scaleY: number): (Keypoint | null)[] {
  const points: (Keypoint | null)[] = [];
  for (let i = 0; i + 2 < flat.length; i += 3) {
    const x = flat[i] ?? 0;
    const y = flat[i + 1] ?? 0;
    const confidence = flat[i + 2] ?? 0;
    points.push(confidence > 0 ? { x: round(x * scaleX), y: round(y * scaleY) } : null);
  }
  return points;
}

/**
 * Render a pose as an editable SVG skeleton scaled to the target extent.
 * Keypoints with zero confidence are omitted, as are limbs touching them.
 */
export function poseToSvg(pose: OpenPoseInput, extent: Extent): string {
  const scaleX = extent.width / pose.canvas_width;
  const scaleY = extent.height / pose.canvas_height;
  const elements: string[] = [];

  for (const person of pose.people) {
    const points = keypointsOf(person.pose_keypoints_2d, scaleX, scaleY);
    POSE_LIMBS.forEach(([a, b], limb) => {
      const start = points[a];
      const end = points[b];
      if (!start || !end) return;
      const color = LIMB_COLORS[limb % LIMB_COLORS.length];
      elements.push(
        `<line x1="${start.x}" y1="${start.y}" x2="${end.x}" y2="${end.y}" stroke="${color}" stroke-width="4" stroke-opacity="0.6"/>`,
      );
    });
    points.forEach((point) => {
      if (point) {
        elements.push(`<circle cx="${point.x}" cy="${point.y}" r="4" fill="#ffffff"/>`);
      }
    });
  }

  const { width, height } = extent;
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    ...elements,
    '</svg>',
  ].join('\n');
}
