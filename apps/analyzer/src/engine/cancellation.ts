import { AnalysisCancelledError } from "./errors";
import type { AnalysisRunOptions, CancellationReason } from "./types";

export const resolveCancellation = (
  options: AnalysisRunOptions,
): CancellationReason | null => {
  if (options.signal?.aborted) {
    return "aborted";
  }
  if (options.deadline !== undefined) {
    const now = options.now ?? Date.now;
    if (now() >= options.deadline) {
      return "deadline";
    }
  }
  return null;
};

export const throwIfCancelled = (
  options: AnalysisRunOptions,
  processedFrames: number,
): void => {
  const reason = resolveCancellation(options);
  if (reason) {
    throw new AnalysisCancelledError(reason, processedFrames);
  }
};
