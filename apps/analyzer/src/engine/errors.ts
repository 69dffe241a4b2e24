export type AnalysisErrorCode =
  | "EMPTY_STREAM"
  | "ORDERING"
  | "MISSING_JOINT"
  | "DEGENERATE_GEOMETRY"
  | "CANCELLED"
  | "AGGREGATOR_STATE"
  | "STREAM_FORMAT";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptyStreamError extends AnalysisError {
  constructor(
    readonly receivedFrames: number,
    message = `No usable frames in keypoint stream (${receivedFrames} received)`,
  ) {
    super("EMPTY_STREAM", message);
  }
}

export class OrderingError extends AnalysisError {
  constructor(
    readonly position: number,
    readonly timestamp: number,
    readonly previousTimestamp: number | null,
  ) {
    super(
      "ORDERING",
      previousTimestamp === null
        ? `Frame ${position} has a non-finite timestamp`
        : `Frame ${position} timestamp ${timestamp}s precedes previous ${previousTimestamp}s`,
    );
  }
}

export class MissingJointError extends AnalysisError {
  constructor(readonly joint: string) {
    super("MISSING_JOINT", `Required joint "${joint}" is missing`);
  }
}

export class DegenerateGeometryError extends AnalysisError {
  constructor(readonly joint: string) {
    super(
      "DEGENERATE_GEOMETRY",
      `Zero-length limb vector at "${joint}" (coincident landmarks)`,
    );
  }
}

export class AnalysisCancelledError extends AnalysisError {
  constructor(
    readonly reason: "aborted" | "deadline",
    readonly processedFrames: number,
  ) {
    super(
      "CANCELLED",
      reason === "deadline"
        ? `Analysis deadline exceeded after ${processedFrames} frames`
        : `Analysis aborted after ${processedFrames} frames`,
    );
  }
}

export class AggregatorStateError extends AnalysisError {
  constructor(message: string) {
    super("AGGREGATOR_STATE", message);
  }
}

export class KeypointStreamFormatError extends AnalysisError {
  constructor(
    message: string,
    readonly position: number | null = null,
  ) {
    super(
      "STREAM_FORMAT",
      position === null ? message : `Frame ${position}: ${message}`,
    );
  }
}

export const isAnalysisError = (error: unknown): error is AnalysisError => {
  return error instanceof AnalysisError;
};
