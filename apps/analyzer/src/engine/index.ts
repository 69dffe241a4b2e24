import { createReportTranslator } from "../shared/i18n/config";
import { describeError, getLogger } from "../shared/logger";
import type { FrameStats, AnalysisReport } from "../shared/types/report";
import { SequenceAggregator } from "./aggregation/sequence-aggregator";
import classifyCompensatingSide from "./classification/compensating-side";
import classifySeverity from "./classification/severity";
import {
  type AnalysisConfig,
  type AnalysisConfigOverrides,
  resolveAnalysisConfig,
} from "./config/analysis-config";
import {
  AnalysisCancelledError,
  EmptyStreamError,
  isAnalysisError,
} from "./errors";
import { throwIfCancelled } from "./cancellation";
import { FrameGate } from "./ingestion/frame-gate";
import { sequenceFrames } from "./ingestion/ordering";
import { ReportBuilder } from "./report/report-builder";
import { captureEngineException } from "./sentry";
import type { AnalysisOutcome, AnalysisRunOptions, FrameInput } from "./types";

const logger = getLogger("analysis-engine", "engine");

export type AnalysisEngineOptions = {
  config?: AnalysisConfigOverrides | null;
  /** Whether `STANCECHECK_*` variables apply. Defaults to true. */
  useEnv?: boolean;
};

/**
 * Keypoint stream → compensation report. Each call to `analyze` is an
 * independent single pass; the engine holds configuration only.
 */
export class AnalysisEngine {
  readonly config: Readonly<AnalysisConfig>;

  private readonly reportBuilder: ReportBuilder;

  constructor(options: AnalysisEngineOptions = {}) {
    this.config = resolveAnalysisConfig(options.config, {
      useEnv: options.useEnv,
    });
    this.reportBuilder = new ReportBuilder(
      createReportTranslator(this.config.language),
    );
  }

  /** Throws `AnalysisError` subclasses on failure or cancellation. */
  analyze(frames: FrameInput, options: AnalysisRunOptions = {}): AnalysisReport {
    const { config } = this;
    const sequenced = sequenceFrames(frames, config.ordering);
    const gate = new FrameGate(config.visibilityThreshold);
    const aggregator = new SequenceAggregator({
      neutralWindowSize: config.neutralWindowSize,
      neutralTolerance: config.neutralTolerance,
    });

    let processed = 0;
    for (const { frame, frameIndex } of sequenced) {
      throwIfCancelled(options, processed);

      const decision = gate.evaluate(frame);
      processed += 1;
      if (!decision.allowUpdate) {
        logger.debug("Frame skipped", {
          frameIndex,
          reason: decision.reason,
          joint: decision.joint,
        });
        continue;
      }
      aggregator.push(frameIndex, frame.timestamp, decision.metrics);
    }

    if (aggregator.getFrameCount() === 0) {
      throw new EmptyStreamError(sequenced.length);
    }

    const aggregation = aggregator.finalize();
    const compensatingSide = classifyCompensatingSide(
      aggregation.meanKneeAngleLeft,
      aggregation.meanKneeAngleRight,
      config.sideEpsilonDeg,
    );
    const severity = classifySeverity(aggregation.exactAverages, {
      hipShift: config.hipShiftThreshold,
      kneeAsymmetry: config.kneeAsymmetryThreshold,
    });

    const frameStats: FrameStats = {
      received: sequenced.length,
      analyzed: gate.getAcceptedFrameCount(),
      skipped: gate.getSkippedFrameCount(),
      skipped_by_reason: gate.getSkipCounts(),
    };

    const report = this.reportBuilder.build({
      aggregation,
      compensatingSide,
      severity,
      frameStats,
    });

    logger.info("Analysis completed", {
      frames: frameStats.received,
      analyzed: frameStats.analyzed,
      severity,
      compensatingSide,
    });
    return report;
  }

  /** Like `analyze`, but reports the outcome instead of throwing. */
  run(frames: FrameInput, options: AnalysisRunOptions = {}): AnalysisOutcome {
    try {
      return { status: "completed", report: this.analyze(frames, options) };
    } catch (error) {
      if (error instanceof AnalysisCancelledError) {
        logger.info("Analysis cancelled", {
          reason: error.reason,
          processedFrames: error.processedFrames,
        });
        return { status: "cancelled", reason: error.reason };
      }
      if (isAnalysisError(error)) {
        logger.warn("Analysis failed", {
          code: error.code,
          ...describeError(error),
        });
        return { status: "failed", error };
      }

      const unexpected =
        error instanceof Error ? error : new Error(String(error));
      logger.error("Unexpected analysis failure", describeError(unexpected));
      captureEngineException(unexpected, { module: "analysis-engine" }).catch(
        (captureError: unknown) => {
          logger.warn("Failed to report exception", describeError(captureError));
        },
      );
      return { status: "failed", error: unexpected };
    }
  }
}

export const analyzeKeypointStream = (
  frames: FrameInput,
  options: AnalysisEngineOptions & AnalysisRunOptions = {},
): AnalysisReport => {
  const { config, useEnv, ...runOptions } = options;
  return new AnalysisEngine({ config, useEnv }).analyze(frames, runOptions);
};

export * from "./errors";
export type {
  AnalysisOutcome,
  AnalysisRunOptions,
  CancellationReason,
  FrameInput,
} from "./types";
