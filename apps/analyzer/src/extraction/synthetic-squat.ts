import {
  JOINT_NAMES,
  type Frame,
  type JointName,
  type Landmark,
  type LandmarkSet,
} from "../shared/types/landmarks";

export type SyntheticSquatOptions = {
  fps?: number;
  totalFrames?: number;
  frameStride?: number;
  /** Seconds per full pass of the phase curve. */
  cycleDuration?: number;
  /** Squat repetitions over `cycleDuration` (the curve is sin(t·π·reps)). */
  repetitions?: number;
  /** Peak lateral drift in normalized units. */
  compensationAmplitude?: number;
};

export const SYNTHETIC_SQUAT_DEFAULTS: Required<SyntheticSquatOptions> = {
  fps: 30,
  totalFrames: 720,
  frameStride: 2,
  cycleDuration: 24,
  repetitions: 6,
  compensationAmplitude: 0.05,
};

type JointCurve = {
  x: number;
  /** Multiplier on the lateral compensation term. */
  drift: number;
  y: number;
  /** Multiplier on the squat phase term. */
  depth: number;
};

const JOINT_CURVES: Record<JointName, JointCurve> = {
  nose: { x: 0.5, drift: 1, y: 0.15, depth: 0 },
  left_shoulder: { x: 0.45, drift: 1, y: 0.25, depth: 0 },
  right_shoulder: { x: 0.55, drift: 1, y: 0.25, depth: 0 },
  left_hip: { x: 0.43, drift: 2, y: 0.5, depth: 0.1 },
  right_hip: { x: 0.57, drift: 0.5, y: 0.5, depth: 0.15 },
  left_knee: { x: 0.42, drift: 2, y: 0.65, depth: 0.15 },
  right_knee: { x: 0.58, drift: 0.5, y: 0.65, depth: 0.1 },
  left_ankle: { x: 0.42, drift: 1.5, y: 0.85, depth: 0 },
  right_ankle: { x: 0.58, drift: 0.3, y: 0.85, depth: 0 },
};

/**
 * Deterministic squat recording: a sinusoidal descent with the pelvis and
 * left leg drifting sideways in phase. Used for demos and tests.
 */
export const generateSyntheticSquat = (
  options: SyntheticSquatOptions = {},
): Frame[] => {
  const settings = { ...SYNTHETIC_SQUAT_DEFAULTS, ...options };
  const stride = Math.max(1, Math.floor(settings.frameStride));
  const frames: Frame[] = [];

  for (let index = 0; index < settings.totalFrames; index += stride) {
    const timestamp = settings.fps > 0 ? index / settings.fps : 0;
    const t = timestamp / settings.cycleDuration;
    const phase = Math.sin(t * Math.PI * settings.repetitions);
    const compensation = settings.compensationAmplitude * phase;

    const landmarks: LandmarkSet = {};
    for (const joint of JOINT_NAMES) {
      const curve = JOINT_CURVES[joint];
      const landmark: Landmark = {
        x: curve.x + compensation * curve.drift,
        y: curve.y + phase * curve.depth,
        z: 0,
        visibility: 1,
      };
      landmarks[joint] = landmark;
    }

    frames.push({ timestamp, landmarks, index });
  }

  return frames;
};
