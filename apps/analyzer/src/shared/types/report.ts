import type { AggregateMetrics, FrameMetrics, FrameSkipReason } from "./metrics";

export type CompensationSide = "left" | "right" | "none";

export type Severity = "ok" | "attention" | "problem";

export const SEVERITY_ORDER: Record<Severity, number> = {
  ok: 0,
  attention: 1,
  problem: 2,
};

export type KeyMomentLabel = "neutral" | "peak_compensation";

export type KeyMoment = {
  label: KeyMomentLabel;
  frame_index: number;
  timestamp: number;
  metrics: FrameMetrics;
};

export type FrameStats = {
  received: number;
  analyzed: number;
  skipped: number;
  skipped_by_reason: Record<FrameSkipReason, number>;
};

export type AnalysisReport = {
  summary: AggregateMetrics;
  compensating_side: CompensationSide;
  severity: Severity;
  compensation_detected: boolean;
  message: string;
  recommendation: string;
  key_moments: [KeyMoment, KeyMoment];
  frame_stats: FrameStats;
};
