import type { Frame, Landmark, RequiredJoint } from "../../shared/types/landmarks";
import { REQUIRED_JOINTS } from "../../shared/types/landmarks";
import type { FrameMetrics, FrameMetricsResult } from "../../shared/types/metrics";
import { isUsableLandmark } from "../../shared/validation/guards";
import { DegenerateGeometryError, MissingJointError } from "../errors";
import { computeHipShift } from "./hip-shift";
import { computeKneeAngle, computeKneeAsymmetry } from "./knee-angle";

export { computeHipShift } from "./hip-shift";
export {
  ASYMMETRY_EPSILON,
  computeJointAngle,
  computeKneeAngle,
  computeKneeAsymmetry,
} from "./knee-angle";

type RequiredLandmarks = Record<RequiredJoint, Landmark>;

const requireJoint = (frame: Frame, joint: RequiredJoint): Landmark => {
  const landmark = frame.landmarks[joint];
  if (!landmark) {
    throw new MissingJointError(joint);
  }
  return landmark;
};

const collectRequired = (frame: Frame): RequiredLandmarks => ({
  left_shoulder: requireJoint(frame, "left_shoulder"),
  right_shoulder: requireJoint(frame, "right_shoulder"),
  left_hip: requireJoint(frame, "left_hip"),
  right_hip: requireJoint(frame, "right_hip"),
  left_knee: requireJoint(frame, "left_knee"),
  right_knee: requireJoint(frame, "right_knee"),
  left_ankle: requireJoint(frame, "left_ankle"),
  right_ankle: requireJoint(frame, "right_ankle"),
});

/**
 * Frame → metrics. Throws `MissingJointError` or `DegenerateGeometryError`;
 * visibility filtering happens upstream in `evaluateFrame`.
 */
export const computeFrameMetrics = (frame: Frame): FrameMetrics => {
  const joints = collectRequired(frame);

  const kneeAngleLeft = computeKneeAngle(
    joints.left_hip,
    joints.left_knee,
    joints.left_ankle,
    "left_knee",
  );
  const kneeAngleRight = computeKneeAngle(
    joints.right_hip,
    joints.right_knee,
    joints.right_ankle,
    "right_knee",
  );

  return Object.freeze({
    hip_shift: computeHipShift(joints.left_hip, joints.right_hip),
    knee_angle_left: kneeAngleLeft,
    knee_angle_right: kneeAngleRight,
    knee_asymmetry: computeKneeAsymmetry(kneeAngleLeft, kneeAngleRight),
  });
};

/**
 * Full per-frame check: presence, coordinate validity and visibility of every
 * required joint, then geometry. Never throws for frame-level problems.
 */
export const evaluateFrame = (
  frame: Frame,
  visibilityThreshold: number,
): FrameMetricsResult => {
  for (const joint of REQUIRED_JOINTS) {
    const landmark = frame.landmarks[joint];
    if (!landmark) {
      return { ok: false, reason: "missing-joint", joint };
    }
    if (!isUsableLandmark(landmark)) {
      return { ok: false, reason: "invalid-coordinates", joint };
    }
    if (
      !Number.isFinite(landmark.visibility) ||
      landmark.visibility < visibilityThreshold
    ) {
      return { ok: false, reason: "low-visibility", joint };
    }
  }

  try {
    return { ok: true, metrics: computeFrameMetrics(frame) };
  } catch (error) {
    if (error instanceof DegenerateGeometryError) {
      return { ok: false, reason: "degenerate-geometry", joint: error.joint };
    }
    if (error instanceof MissingJointError) {
      return { ok: false, reason: "missing-joint", joint: error.joint };
    }
    throw error;
  }
};
