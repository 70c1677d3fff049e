import { describe, it, expect } from 'vitest';
import { openPoseSchema } from '../pose-schema';

describe('openPoseSchema', () => {
  it('accepts a pose with one person', () => {
    const result = openPoseSchema.safeParse({
      canvas_width: 512,
      canvas_height: 512,
      people: [{ pose_keypoints_2d: [10, 20, 1, 30, 40, 0.5] }],
    });
    expect(result.success).toBe(true);
  });

  it('accepts a pose with nobody in it', () => {
    const result = openPoseSchema.safeParse({ canvas_width: 64, canvas_height: 64, people: [] });
    expect(result.success).toBe(true);
  });

  it('rejects keypoints that are not triples', () => {
    const result = openPoseSchema.safeParse({
      canvas_width: 512,
      canvas_height: 512,
      people: [{ pose_keypoints_2d: [10, 20] }],
    });
    expect(result.success).toBe(false);
  });

  it('rejects a zero-sized canvas', () => {
    const result = openPoseSchema.safeParse({ canvas_width: 0, canvas_height: 512, people: [] });
    expect(result.success).toBe(false);
  });
});
