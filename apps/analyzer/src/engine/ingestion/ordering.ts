import type { Frame } from "../../shared/types/landmarks";
import type { OrderingPolicy } from "../config/analysis-config";
import { OrderingError } from "../errors";

export type SequencedFrame = {
  frame: Frame;
  /** Position in the input, before any reordering or filtering. */
  position: number;
  /** `frame.index` when the producer supplied one, otherwise `position`. */
  frameIndex: number;
};

const resolveFrameIndex = (frame: Frame, position: number): number => {
  return typeof frame.index === "number" && Number.isInteger(frame.index)
    ? frame.index
    : position;
};

/** Tracks the previous timestamp and rejects any decrease. */
export class OrderingGuard {
  private previousTimestamp: number | null = null;

  check(position: number, timestamp: number): void {
    if (!Number.isFinite(timestamp)) {
      throw new OrderingError(position, timestamp, null);
    }
    if (this.previousTimestamp !== null && timestamp < this.previousTimestamp) {
      throw new OrderingError(position, timestamp, this.previousTimestamp);
    }
    this.previousTimestamp = timestamp;
  }
}

/**
 * Applies the ordering policy. `reject` validates in input order; `reorder`
 * sorts by timestamp, keeping input order among equal timestamps.
 */
export const sequenceFrames = (
  frames: Iterable<Frame>,
  policy: OrderingPolicy,
): SequencedFrame[] => {
  const sequenced: SequencedFrame[] = [];
  let position = 0;
  for (const frame of frames) {
    sequenced.push({
      frame,
      position,
      frameIndex: resolveFrameIndex(frame, position),
    });
    position += 1;
  }

  if (policy === "reject") {
    const guard = new OrderingGuard();
    for (const entry of sequenced) {
      guard.check(entry.position, entry.frame.timestamp);
    }
    return sequenced;
  }

  for (const entry of sequenced) {
    if (!Number.isFinite(entry.frame.timestamp)) {
      throw new OrderingError(entry.position, entry.frame.timestamp, null);
    }
  }

  return [...sequenced].sort((a, b) => {
    const delta = a.frame.timestamp - b.frame.timestamp;
    return delta !== 0 ? delta : a.position - b.position;
  });
};
