import type { Landmark } from "../../shared/types/landmarks";

/** Lateral pelvic offset in normalized frame-width units. */
export const computeHipShift = (
  leftHip: Landmark,
  rightHip: Landmark,
): number => {
  return Math.abs(leftHip.x - rightHip.x);
};
