import type { AggregateMetrics, FrameMetrics } from "../../shared/types/metrics";
import type { KeyMoment, KeyMomentLabel } from "../../shared/types/report";
import { AggregatorStateError, EmptyStreamError } from "../errors";

export type AggregatorState = "collecting" | "finalized";

export type SequenceAggregatorOptions = {
  neutralWindowSize: number;
  neutralTolerance: number;
};

export type SeverityAverages = Pick<
  AggregateMetrics,
  "avg_hip_shift" | "avg_knee_asymmetry"
>;

export type AggregationResult = {
  /** Rounded for presentation. */
  summary: AggregateMetrics;
  /** Unrounded averages; severity is classified on these. */
  exactAverages: SeverityAverages;
  keyMoments: readonly [KeyMoment, KeyMoment];
  meanKneeAngleLeft: number;
  meanKneeAngleRight: number;
  meanScore: number;
  frameCount: number;
};

type Candidate = {
  frameIndex: number;
  timestamp: number;
  metrics: FrameMetrics;
  score: number;
};

export const SUMMARY_PRECISION = 6;

export const roundMetric = (value: number): number => {
  return Number.isFinite(value) ? Number(value.toFixed(SUMMARY_PRECISION)) : 0;
};

/** Neumaier-compensated running sum. */
class CompensatedSum {
  private sum = 0;

  private compensation = 0;

  add(value: number): void {
    const total = this.sum + value;
    if (Math.abs(this.sum) >= Math.abs(value)) {
      this.compensation += this.sum - total + value;
    } else {
      this.compensation += value - total + this.sum;
    }
    this.sum = total;
  }

  get value(): number {
    return this.sum + this.compensation;
  }
}

/**
 * Neutral-frame candidates: strict prefix minima whose score is still within
 * `tolerance` of the running minimum. The first entry is always the earliest
 * frame within tolerance of the minimum seen so far.
 */
class NeutralTracker {
  private readonly candidates: Candidate[] = [];

  private readonly tolerance: number;

  constructor(tolerance: number) {
    this.tolerance = tolerance;
  }

  push(candidate: Candidate): void {
    const last = this.candidates[this.candidates.length - 1];
    if (last && candidate.score >= last.score) {
      return;
    }
    this.candidates.push(candidate);
    const ceiling = candidate.score + this.tolerance;
    while (this.candidates.length > 1 && this.candidates[0].score > ceiling) {
      this.candidates.shift();
    }
  }

  current(): Candidate | null {
    return this.candidates[0] ?? null;
  }
}

/** Combined compensation score used to rank frames. */
export const compensationScore = (metrics: FrameMetrics): number => {
  return metrics.hip_shift + metrics.knee_asymmetry;
};

const toKeyMoment = (label: KeyMomentLabel, candidate: Candidate): KeyMoment =>
  Object.freeze({
    label,
    frame_index: candidate.frameIndex,
    timestamp: candidate.timestamp,
    metrics: Object.freeze({ ...candidate.metrics }),
  });

/**
 * Single-pass accumulator over retained frames. Keeps sums, maxima and the
 * neutral/peak candidates; `finalize` freezes the result.
 */
export class SequenceAggregator {
  private state: AggregatorState = "collecting";

  private result: AggregationResult | null = null;

  private count = 0;

  private readonly hipShiftSum = new CompensatedSum();

  private hipShiftMax = 0;

  private readonly asymmetrySum = new CompensatedSum();

  private asymmetryMax = 0;

  private kneeLeftSum = 0;

  private kneeRightSum = 0;

  private scoreSum = 0;

  private peak: Candidate | null = null;

  private readonly windowNeutral: NeutralTracker;

  private readonly streamNeutral: NeutralTracker;

  private readonly windowSize: number;

  constructor(options: SequenceAggregatorOptions) {
    this.windowSize = Math.max(1, Math.floor(options.neutralWindowSize));
    const tolerance = Math.max(0, options.neutralTolerance);
    this.windowNeutral = new NeutralTracker(tolerance);
    this.streamNeutral = new NeutralTracker(tolerance);
  }

  getState(): AggregatorState {
    return this.state;
  }

  getFrameCount(): number {
    return this.count;
  }

  push(frameIndex: number, timestamp: number, metrics: FrameMetrics): void {
    if (this.state === "finalized") {
      throw new AggregatorStateError("Cannot push frames after finalize()");
    }

    const score = compensationScore(metrics);
    const candidate: Candidate = { frameIndex, timestamp, metrics, score };

    this.count += 1;
    this.hipShiftSum.add(metrics.hip_shift);
    this.asymmetrySum.add(metrics.knee_asymmetry);
    this.kneeLeftSum += metrics.knee_angle_left;
    this.kneeRightSum += metrics.knee_angle_right;
    this.scoreSum += score;

    if (this.count === 1 || metrics.hip_shift > this.hipShiftMax) {
      this.hipShiftMax = metrics.hip_shift;
    }
    if (this.count === 1 || metrics.knee_asymmetry > this.asymmetryMax) {
      this.asymmetryMax = metrics.knee_asymmetry;
    }

    // Strict comparison: the first frame reaching the maximum keeps it.
    if (!this.peak || score > this.peak.score) {
      this.peak = candidate;
    }

    this.streamNeutral.push(candidate);
    if (this.count <= this.windowSize) {
      this.windowNeutral.push(candidate);
    }
  }

  finalize(): AggregationResult {
    if (this.result) {
      return this.result;
    }

    const { peak } = this;
    const windowNeutral = this.windowNeutral.current();
    const streamNeutral = this.streamNeutral.current();
    if (this.count === 0 || !peak || !windowNeutral || !streamNeutral) {
      throw new EmptyStreamError(0, "Cannot finalize an aggregator without frames");
    }

    const meanScore = this.scoreSum / this.count;
    // An opening window that is noisier than the stream average is not a
    // usable baseline; fall back to the whole stream.
    const neutral = windowNeutral.score > meanScore ? streamNeutral : windowNeutral;

    const exactAverages: SeverityAverages = Object.freeze({
      avg_hip_shift: this.hipShiftSum.value / this.count,
      avg_knee_asymmetry: this.asymmetrySum.value / this.count,
    });
    const summary: AggregateMetrics = Object.freeze({
      avg_hip_shift: roundMetric(exactAverages.avg_hip_shift),
      max_hip_shift: roundMetric(this.hipShiftMax),
      avg_knee_asymmetry: roundMetric(exactAverages.avg_knee_asymmetry),
      max_knee_asymmetry: roundMetric(this.asymmetryMax),
    });

    const keyMoments: readonly [KeyMoment, KeyMoment] = [
      toKeyMoment("neutral", neutral),
      toKeyMoment("peak_compensation", peak),
    ];
    Object.freeze(keyMoments);

    this.result = Object.freeze({
      summary,
      exactAverages,
      keyMoments,
      meanKneeAngleLeft: this.kneeLeftSum / this.count,
      meanKneeAngleRight: this.kneeRightSum / this.count,
      meanScore,
      frameCount: this.count,
    });
    this.state = "finalized";
    return this.result;
  }
}
