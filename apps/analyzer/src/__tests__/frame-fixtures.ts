import type { Frame, JointName, Landmark } from "../shared/types/landmarks";
import type { FrameMetrics } from "../shared/types/metrics";

export type SquatFrameSpec = {
  timestamp: number;
  /** Interior knee angles in degrees. */
  kneeLeft?: number;
  kneeRight?: number;
  /** Horizontal distance between the hips. */
  hipShift?: number;
  index?: number;
  visibility?: number;
};

const THIGH = 0.15;
const SHIN = 0.2;

const point = (x: number, y: number, visibility: number): Landmark => ({
  x,
  y,
  z: 0,
  visibility,
});

const legLandmarks = (
  hipX: number,
  angleDeg: number,
  direction: 1 | -1,
  visibility: number,
) => {
  const radians = (angleDeg * Math.PI) / 180;
  const knee = point(hipX, 0.5 + THIGH, visibility);
  // The thigh points straight up from the knee; the shin is rotated from it
  // by the requested interior angle.
  const ankle = point(
    hipX + direction * SHIN * Math.sin(radians),
    knee.y - SHIN * Math.cos(radians),
    visibility,
  );
  return { hip: point(hipX, 0.5, visibility), knee, ankle };
};

export const buildFrame = ({
  timestamp,
  kneeLeft = 180,
  kneeRight = 180,
  hipShift = 0,
  index,
  visibility = 0.95,
}: SquatFrameSpec): Frame => {
  // Left hip on the origin so the measured hip shift is exactly `hipShift`.
  const left = legLandmarks(0, kneeLeft, -1, visibility);
  const right = legLandmarks(hipShift, kneeRight, 1, visibility);

  const landmarks: Partial<Record<JointName, Landmark>> = {
    nose: point(0.05, 0.1, visibility),
    left_shoulder: point(0, 0.25, visibility),
    right_shoulder: point(0.1, 0.25, visibility),
    left_hip: left.hip,
    right_hip: right.hip,
    left_knee: left.knee,
    right_knee: right.knee,
    left_ankle: left.ankle,
    right_ankle: right.ankle,
  };

  const frame: Frame = { timestamp, landmarks };
  if (index !== undefined) {
    frame.index = index;
  }
  return frame;
};

export const buildFrames = (
  count: number,
  spec: Omit<SquatFrameSpec, "timestamp"> = {},
  fps = 30,
): Frame[] => {
  return Array.from({ length: count }, (_, position) =>
    buildFrame({ ...spec, timestamp: position / fps }),
  );
};

export const metrics = (overrides: Partial<FrameMetrics> = {}): FrameMetrics => ({
  hip_shift: 0,
  knee_angle_left: 170,
  knee_angle_right: 170,
  knee_asymmetry: 0,
  ...overrides,
});
