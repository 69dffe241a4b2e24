import type { AggregateMetrics } from "../../shared/types/metrics";
import { SEVERITY_ORDER, type Severity } from "../../shared/types/report";
import type { SeverityBand } from "../config/analysis-config";

export type SeverityThresholds = {
  hipShift: SeverityBand;
  kneeAsymmetry: SeverityBand;
};

// A value within a few ulps of a threshold is accumulation error, not excess.
const THRESHOLD_ULPS = 4;

const exceeds = (value: number, threshold: number): boolean => {
  return value - threshold > Math.abs(threshold) * Number.EPSILON * THRESHOLD_ULPS;
};

const bandSeverity = (value: number, band: SeverityBand): Severity => {
  if (!Number.isFinite(value)) return "ok";
  if (exceeds(value, band.problem)) return "problem";
  if (exceeds(value, band.attention)) return "attention";
  return "ok";
};

const maxSeverity = (a: Severity, b: Severity): Severity => {
  return SEVERITY_ORDER[a] >= SEVERITY_ORDER[b] ? a : b;
};

/**
 * Worst band reached by either average. Thresholds are exclusive; pass the
 * unrounded averages.
 */
const classifySeverity = (
  summary: Pick<AggregateMetrics, "avg_hip_shift" | "avg_knee_asymmetry">,
  thresholds: SeverityThresholds,
): Severity => {
  return maxSeverity(
    bandSeverity(summary.avg_hip_shift, thresholds.hipShift),
    bandSeverity(summary.avg_knee_asymmetry, thresholds.kneeAsymmetry),
  );
};

export default classifySeverity;
