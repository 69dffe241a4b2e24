import type { AnalysisEngine } from "../engine";
import { throwIfCancelled } from "../engine/cancellation";
import type { AnalysisRunOptions } from "../engine/types";
import { describeError, getLogger } from "../shared/logger";
import type { FrameSource, PoseExtractor } from "../shared/types/extractor";
import type { Frame } from "../shared/types/landmarks";
import type { AnalysisReport } from "../shared/types/report";
import { poseToFrame } from "./pose-landmarks";

const logger = getLogger("video-analysis", "extraction");

export const DEFAULT_FRAME_STRIDE = 2;

const PROGRESS_LOG_INTERVAL = 100;

export type ExtractionOptions = AnalysisRunOptions & {
  /** Only every n-th decoded frame is sent to the extractor. */
  frameStride?: number;
};

export type ExtractionSummary = {
  frames: Frame[];
  decodedFrames: number;
  sampledFrames: number;
  failedFrames: number;
};

export type VideoAnalysisResult = {
  fps: number;
  total_frames: number;
  duration: number;
  frames_extracted: number;
  report: AnalysisReport;
};

export const computeDuration = (totalFrames: number, fps: number): number => {
  return fps > 0 ? totalFrames / fps : 0;
};

/**
 * Runs the extractor over sampled frames of a decoded video. Frames without a
 * detected pose are dropped; a frame whose extraction throws is logged and
 * skipped.
 */
export const extractKeypointStream = async <TImage>(
  source: FrameSource<TImage>,
  extractor: PoseExtractor<TImage>,
  options: ExtractionOptions = {},
): Promise<ExtractionSummary> => {
  const stride = Math.max(
    1,
    Math.floor(options.frameStride ?? DEFAULT_FRAME_STRIDE),
  );
  const { totalFrames } = source.info;
  const frames: Frame[] = [];
  let decodedFrames = 0;
  let sampledFrames = 0;
  let failedFrames = 0;

  await extractor.initialize();

  for await (const decoded of source) {
    throwIfCancelled(options, decodedFrames);

    if (decoded.index % stride === 0) {
      sampledFrames += 1;
      try {
        const pose = await extractor.extract(decoded);
        if (pose) {
          frames.push(poseToFrame(pose, decoded.timestamp, decoded.index));
        }
      } catch (error) {
        failedFrames += 1;
        logger.warn("Failed to process frame", {
          frameIndex: decoded.index,
          ...describeError(error),
        });
      }
    }

    decodedFrames += 1;
    if (decodedFrames % PROGRESS_LOG_INTERVAL === 0) {
      logger.info(`Processed ${decodedFrames}/${totalFrames} frames`, {
        extracted: frames.length,
      });
    }
  }

  logger.info("Keypoint extraction complete", {
    decodedFrames,
    sampledFrames,
    extracted: frames.length,
    failedFrames,
  });

  return { frames, decodedFrames, sampledFrames, failedFrames };
};

/** Extraction followed by analysis, with the video-level figures attached. */
export const analyzeVideo = async <TImage>(
  source: FrameSource<TImage>,
  extractor: PoseExtractor<TImage>,
  engine: AnalysisEngine,
  options: ExtractionOptions = {},
): Promise<VideoAnalysisResult> => {
  const { fps, totalFrames } = source.info;
  const extraction = await extractKeypointStream(source, extractor, options);
  const report = engine.analyze(extraction.frames, {
    signal: options.signal,
    deadline: options.deadline,
    now: options.now,
  });

  return {
    fps,
    total_frames: totalFrames,
    duration: computeDuration(totalFrames, fps),
    frames_extracted: extraction.frames.length,
    report,
  };
};
