export type Landmark = {
  x: number;
  y: number;
  z: number;
  visibility: number;
};

export const JOINT_NAMES = [
  "nose",
  "left_shoulder",
  "right_shoulder",
  "left_hip",
  "right_hip",
  "left_knee",
  "right_knee",
  "left_ankle",
  "right_ankle",
] as const;

export type JointName = (typeof JOINT_NAMES)[number];

/** Joints every analysed frame must carry above the visibility threshold. */
export const REQUIRED_JOINTS = [
  "left_shoulder",
  "right_shoulder",
  "left_hip",
  "right_hip",
  "left_knee",
  "right_knee",
  "left_ankle",
  "right_ankle",
] as const satisfies readonly JointName[];

export type RequiredJoint = (typeof REQUIRED_JOINTS)[number];

export type LandmarkSet = Partial<Record<JointName, Landmark>>;

export type Frame = {
  /** Seconds from the start of the video. */
  timestamp: number;
  landmarks: LandmarkSet;
  /** Source video frame number, when the producer knows it. */
  index?: number;
};

/** Raw pose landmarker output: one entry per model landmark index. */
export type PoseLandmark = {
  x: number;
  y: number;
  z: number;
  visibility?: number;
};

export type PoseLandmarks = {
  landmarks: PoseLandmark[];
  confidence?: number;
};
