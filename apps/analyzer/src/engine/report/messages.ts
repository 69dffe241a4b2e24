import type { ReportTranslator } from "../../shared/i18n/config";
import type { CompensationSide, KeyMoment, Severity } from "../../shared/types/report";

export type ReportMessages = {
  message: string;
  recommendation: string;
};

/** Knee flexion (180 − interior angle) of the compensating leg at the peak frame. */
export const resolveFlexionAngle = (
  peak: KeyMoment,
  side: CompensationSide,
): number => {
  const { knee_angle_left: left, knee_angle_right: right } = peak.metrics;
  const interior =
    side === "left" ? left : side === "right" ? right : (left + right) / 2;
  return Math.round(180 - interior);
};

export const buildReportMessages = (
  translate: ReportTranslator,
  severity: Severity,
  side: CompensationSide,
  peak: KeyMoment,
): ReportMessages => {
  const values = {
    sideText: translate(`side.${side}`),
    angle: resolveFlexionAngle(peak, side),
  };
  return {
    message: translate(`severity.${severity}.message`, values),
    recommendation: translate(`severity.${severity}.recommendation`, values),
  };
};
