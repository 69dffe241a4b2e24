import type { Landmark } from "../../shared/types/landmarks";
import { DegenerateGeometryError } from "../errors";

export const ASYMMETRY_EPSILON = 1e-6;

const RADIANS_TO_DEGREES = 180 / Math.PI;

type Vector2 = { x: number; y: number };

const toVector = (from: Landmark, to: Landmark): Vector2 => ({
  x: to.x - from.x,
  y: to.y - from.y,
});

/**
 * Interior angle at `vertex` between vertex→first and vertex→second, in the
 * image plane. Throws when either limb vector has zero length.
 */
export const computeJointAngle = (
  first: Landmark,
  vertex: Landmark,
  second: Landmark,
  joint = "knee",
): number => {
  const a = toVector(vertex, first);
  const b = toVector(vertex, second);
  const magnitudeA = Math.hypot(a.x, a.y);
  const magnitudeB = Math.hypot(b.x, b.y);

  if (magnitudeA === 0 || magnitudeB === 0) {
    throw new DegenerateGeometryError(joint);
  }

  const cosine = (a.x * b.x + a.y * b.y) / (magnitudeA * magnitudeB);
  // Rounding can push the cosine a hair outside [-1, 1].
  const clamped = Math.max(-1, Math.min(1, cosine));
  const degrees = Math.acos(clamped) * RADIANS_TO_DEGREES;
  return Math.max(0, Math.min(180, degrees));
};

export const computeKneeAngle = (
  hip: Landmark,
  knee: Landmark,
  ankle: Landmark,
  joint = "knee",
): number => computeJointAngle(hip, knee, ankle, joint);

export const computeKneeAsymmetry = (left: number, right: number): number => {
  return Math.abs(left - right) / Math.max(left, right, ASYMMETRY_EPSILON);
};
