import {
  JOINT_NAMES,
  type JointName,
  type Landmark,
} from "../types/landmarks";

const JOINT_NAME_LOOKUP: ReadonlySet<string> = new Set(JOINT_NAMES);

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

export const isJointName = (value: unknown): value is JointName => {
  return typeof value === "string" && JOINT_NAME_LOOKUP.has(value);
};

/** x and y are required; z defaults to 0 and visibility to 1 when absent. */
export const isLandmarkLike = (
  value: unknown,
): value is Partial<Landmark> & { x: number; y: number } => {
  if (!isRecord(value)) {
    return false;
  }

  const { x, y, z, visibility } = value;

  if (typeof x !== "number" || typeof y !== "number") {
    return false;
  }

  if (z !== undefined && z !== null && typeof z !== "number") {
    return false;
  }

  if (
    visibility !== undefined &&
    visibility !== null &&
    typeof visibility !== "number"
  ) {
    return false;
  }

  return true;
};

export const toLandmark = (
  value: Partial<Landmark> & { x: number; y: number },
): Landmark => {
  return {
    x: value.x,
    y: value.y,
    z: typeof value.z === "number" ? value.z : 0,
    visibility: typeof value.visibility === "number" ? value.visibility : 1,
  };
};

/** Metrics are planar, so depth is not checked. */
export const isUsableLandmark = (landmark: Landmark): boolean => {
  return Number.isFinite(landmark.x) && Number.isFinite(landmark.y);
};
