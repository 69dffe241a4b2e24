import {
  JOINT_NAMES,
  type Frame,
  type JointName,
  type Landmark,
  type LandmarkSet,
  type PoseLandmarks,
} from "../shared/types/landmarks";

/** Positions of the tracked joints in the 33-point MediaPipe pose model. */
export const MEDIAPIPE_LANDMARK_INDEX: Readonly<Record<JointName, number>> =
  Object.freeze({
    nose: 0,
    left_shoulder: 11,
    right_shoulder: 12,
    left_hip: 23,
    right_hip: 24,
    left_knee: 25,
    right_knee: 26,
    left_ankle: 27,
    right_ankle: 28,
  });

export const MEDIAPIPE_LANDMARK_COUNT = 33;

const TRACKED_JOINTS = JOINT_NAMES.map((joint) => ({
  joint,
  index: MEDIAPIPE_LANDMARK_INDEX[joint],
}));

export const poseToLandmarkSet = (pose: PoseLandmarks): LandmarkSet => {
  const landmarks: LandmarkSet = {};
  for (const { joint, index } of TRACKED_JOINTS) {
    const point = pose.landmarks[index];
    if (!point) {
      continue;
    }
    const landmark: Landmark = {
      x: point.x,
      y: point.y,
      z: point.z,
      visibility: point.visibility ?? pose.confidence ?? 1,
    };
    landmarks[joint] = landmark;
  }
  return landmarks;
};

export const poseToFrame = (
  pose: PoseLandmarks,
  timestamp: number,
  index?: number,
): Frame => {
  const frame: Frame = {
    timestamp,
    landmarks: poseToLandmarkSet(pose),
  };
  if (index !== undefined) {
    frame.index = index;
  }
  return frame;
};
