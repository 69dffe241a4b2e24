import type { ReportTranslator } from "../../shared/i18n/config";
import type {
  AnalysisReport,
  CompensationSide,
  FrameStats,
  Severity,
} from "../../shared/types/report";
import type { AggregationResult } from "../aggregation/sequence-aggregator";
import { buildReportMessages } from "./messages";

export type ReportBuildInput = {
  aggregation: AggregationResult;
  compensatingSide: CompensationSide;
  severity: Severity;
  frameStats: FrameStats;
};

/** Assembles the frozen report. Pure: no clock, no I/O. */
export class ReportBuilder {
  private readonly translate: ReportTranslator;

  constructor(translate: ReportTranslator) {
    this.translate = translate;
  }

  build(input: ReportBuildInput): AnalysisReport {
    const { aggregation, compensatingSide, severity, frameStats } = input;
    const [neutral, peak] = aggregation.keyMoments;
    const { message, recommendation } = buildReportMessages(
      this.translate,
      severity,
      compensatingSide,
      peak,
    );

    const report: AnalysisReport = {
      summary: aggregation.summary,
      compensating_side: compensatingSide,
      severity,
      compensation_detected: severity !== "ok",
      message,
      recommendation,
      key_moments: [neutral, peak],
      frame_stats: Object.freeze({
        ...frameStats,
        skipped_by_reason: Object.freeze({ ...frameStats.skipped_by_reason }),
      }),
    };
    Object.freeze(report.key_moments);
    return Object.freeze(report);
  }
}
