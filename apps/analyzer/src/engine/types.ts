import type { Frame } from "../shared/types/landmarks";
import type { AnalysisReport } from "../shared/types/report";
import type { AnalysisError } from "./errors";

export type CancellationReason = "aborted" | "deadline";

export type AnalysisRunOptions = {
  /** Checked between frames; an aborted signal cancels the run. */
  signal?: AbortSignal;
  /** Epoch milliseconds after which the run is cancelled. */
  deadline?: number;
  /** Clock used for the deadline check (tests inject a fake). */
  now?: () => number;
};

export type AnalysisOutcome =
  | { status: "completed"; report: AnalysisReport }
  | { status: "cancelled"; reason: CancellationReason }
  | { status: "failed"; error: AnalysisError | Error };

export type FrameInput = Iterable<Frame>;
