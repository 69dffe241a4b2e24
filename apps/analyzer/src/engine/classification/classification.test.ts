import { describe, expect, it } from "vitest";
import { SEVERITY_ORDER } from "../../shared/types/report";
import { DEFAULT_ANALYSIS_CONFIG } from "../config/analysis-config";
import classifyCompensatingSide from "./compensating-side";
import classifySeverity, { type SeverityThresholds } from "./severity";

const defaults: SeverityThresholds = {
  hipShift: DEFAULT_ANALYSIS_CONFIG.hipShiftThreshold,
  kneeAsymmetry: DEFAULT_ANALYSIS_CONFIG.kneeAsymmetryThreshold,
};

const severityOf = (avgHipShift: number, avgKneeAsymmetry: number) =>
  classifySeverity(
    { avg_hip_shift: avgHipShift, avg_knee_asymmetry: avgKneeAsymmetry },
    defaults,
  );

describe("classifySeverity", () => {
  it("uses strict thresholds", () => {
    expect(severityOf(0.015, 0)).toBe("ok");
    expect(severityOf(0.0151, 0)).toBe("attention");
    expect(severityOf(0.02, 0)).toBe("attention");
    expect(severityOf(0.0201, 0)).toBe("problem");
  });

  it("classifies averages just above a threshold", () => {
    expect(severityOf(0.0150004, 0)).toBe("attention");
    expect(severityOf(0, 0.0200004)).toBe("problem");
  });

  it("ignores accumulation error at a threshold", () => {
    expect(severityOf(0.015 * (1 + Number.EPSILON), 0)).toBe("ok");
  });

  it("takes the worse of the two averages", () => {
    expect(severityOf(0.01, 0.03)).toBe("problem");
    expect(severityOf(0.018, 0.001)).toBe("attention");
    expect(severityOf(0.01, 0.01)).toBe("ok");
  });

  it("is monotonic in either average", () => {
    const values = [0, 0.005, 0.015, 0.016, 0.02, 0.021, 0.5];
    for (const fixed of [0, 0.017, 0.03]) {
      let previous = -1;
      for (const value of values) {
        const rank = SEVERITY_ORDER[severityOf(value, fixed)];
        expect(rank).toBeGreaterThanOrEqual(previous);
        previous = rank;
      }
    }
  });

  it("applies per-metric bands", () => {
    const thresholds: SeverityThresholds = {
      hipShift: { attention: 0.05, problem: 0.1 },
      kneeAsymmetry: defaults.kneeAsymmetry,
    };
    expect(
      classifySeverity({ avg_hip_shift: 0.03, avg_knee_asymmetry: 0 }, thresholds),
    ).toBe("ok");
    expect(
      classifySeverity({ avg_hip_shift: 0.03, avg_knee_asymmetry: 0.03 }, thresholds),
    ).toBe("problem");
  });
});

describe("classifyCompensatingSide", () => {
  it("picks the leg that bends less", () => {
    expect(classifyCompensatingSide(150, 125)).toBe("left");
    expect(classifyCompensatingSide(125, 150)).toBe("right");
  });

  it("returns none when the means are within the tolerance", () => {
    expect(classifyCompensatingSide(150, 148.5)).toBe("none");
    expect(classifyCompensatingSide(150, 150)).toBe("none");
  });

  it("treats a difference equal to the tolerance as a side", () => {
    expect(classifyCompensatingSide(152, 150, 2)).toBe("left");
  });

  it("honours a custom tolerance", () => {
    expect(classifyCompensatingSide(150, 140, 15)).toBe("none");
  });
});
