import type { Frame } from "../../shared/types/landmarks";
import type {
  FrameMetrics,
  FrameSkipReason,
} from "../../shared/types/metrics";
import { evaluateFrame } from "../metrics";

export type FrameGateDecision =
  | { allowUpdate: true; metrics: FrameMetrics; reason: null; joint: null }
  | {
      allowUpdate: false;
      metrics: null;
      reason: FrameSkipReason;
      joint: string | null;
    };

export type SkipCounts = Record<FrameSkipReason, number>;

export const createEmptySkipCounts = (): SkipCounts => ({
  "missing-joint": 0,
  "low-visibility": 0,
  "invalid-coordinates": 0,
  "degenerate-geometry": 0,
});

/**
 * Decides per frame whether it may update the running aggregates. Skipped
 * frames are counted by reason and never reach the aggregator.
 */
export class FrameGate {
  private readonly threshold: number;

  private readonly skipCounts: SkipCounts = createEmptySkipCounts();

  private skippedFrameCount = 0;

  private acceptedFrameCount = 0;

  constructor(visibilityThreshold: number) {
    this.threshold = visibilityThreshold;
  }

  evaluate(frame: Frame): FrameGateDecision {
    const result = evaluateFrame(frame, this.threshold);
    if (result.ok) {
      this.acceptedFrameCount += 1;
      return {
        allowUpdate: true,
        metrics: result.metrics,
        reason: null,
        joint: null,
      };
    }

    this.skippedFrameCount += 1;
    this.skipCounts[result.reason] += 1;

    return {
      allowUpdate: false,
      metrics: null,
      reason: result.reason,
      joint: result.joint ?? null,
    };
  }

  getSkippedFrameCount(): number {
    return this.skippedFrameCount;
  }

  getAcceptedFrameCount(): number {
    return this.acceptedFrameCount;
  }

  getSkipCounts(): SkipCounts {
    return { ...this.skipCounts };
  }
}
