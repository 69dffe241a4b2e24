import type { PoseLandmarks } from "./landmarks";

/** A decoded video frame handed to the pose extractor. `image` is whatever the decoder produces. */
export type DecodedFrame<TImage = unknown> = {
  index: number;
  /** Seconds from the start of the video. */
  timestamp: number;
  image: TImage;
};

export type FrameSourceInfo = {
  fps: number;
  totalFrames: number;
};

export type FrameSource<TImage = unknown> = AsyncIterable<DecodedFrame<TImage>> & {
  readonly info: FrameSourceInfo;
};

export type InitializeFn = () => Promise<void>;
export type ExtractFn<TImage> = (
  frame: DecodedFrame<TImage>,
) => Promise<PoseLandmarks | null>;
export type DisposeFn = () => Promise<void>;

/**
 * Frame → landmark capability. Implementations wrap a pose model; the
 * analysis engine only ever sees the landmarks they return.
 */
export interface PoseExtractor<TImage = unknown> {
  readonly name: string;
  initialize: InitializeFn;
  extract: ExtractFn<TImage>;
  dispose: DisposeFn;
}
