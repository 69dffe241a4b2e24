import type { CompensationSide } from "../../shared/types/report";

export const DEFAULT_SIDE_EPSILON_DEG = 2;

/**
 * The leg that bends less (mean knee angle closer to 180°) is the one the
 * patient keeps load off. Means closer than `epsilonDeg` give `none`.
 */
const classifyCompensatingSide = (
  meanKneeAngleLeft: number,
  meanKneeAngleRight: number,
  epsilonDeg: number = DEFAULT_SIDE_EPSILON_DEG,
): CompensationSide => {
  if (!Number.isFinite(meanKneeAngleLeft) || !Number.isFinite(meanKneeAngleRight)) {
    return "none";
  }
  const difference = meanKneeAngleLeft - meanKneeAngleRight;
  if (Math.abs(difference) < epsilonDeg) return "none";
  return difference > 0 ? "left" : "right";
};

export default classifyCompensatingSide;
