import { z } from 'zod';

/** One detected person: flat [x, y, confidence] triples in COCO-18 keypoint order */
export const posePersonSchema = z.object({
  pose_keypoints_2d: z.array(z.number()).refine(
    (k) => k.length % 3 === 0,
    { message: 'Keypoints must be [x, y, confidence] triples' },
  ),
});

/** OpenPose JSON as produced by the pose estimation preprocessor */
export const openPoseSchema = z.object({
  canvas_width: z.number().positive(),
  canvas_height: z.number().positive(),
  people: z.array(posePersonSchema),
});

export type PosePersonInput = z.infer<typeof posePersonSchema>;
export type OpenPoseInput = z.infer<typeof openPoseSchema>;
