export type FrameMetrics = {
  /** |left_hip.x - right_hip.x| in normalized frame-width units. */
  hip_shift: number;
  /** Interior knee angle in degrees; 180 is a straight leg. */
  knee_angle_left: number;
  knee_angle_right: number;
  knee_asymmetry: number;
};

export type AggregateMetrics = {
  avg_hip_shift: number;
  max_hip_shift: number;
  avg_knee_asymmetry: number;
  max_knee_asymmetry: number;
};

export type FrameSkipReason =
  | "missing-joint"
  | "low-visibility"
  | "invalid-coordinates"
  | "degenerate-geometry";

export type FrameMetricsResult =
  | { ok: true; metrics: FrameMetrics }
  | { ok: false; reason: FrameSkipReason; joint?: string };
