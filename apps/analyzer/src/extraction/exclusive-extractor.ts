import { describeError, getLogger } from "../shared/logger";
import type { DecodedFrame, PoseExtractor } from "../shared/types/extractor";
import type { PoseLandmarks } from "../shared/types/landmarks";

const logger = getLogger("exclusive-extractor", "extraction");

export type ExclusiveExtractorState =
  | "idle"
  | "initializing"
  | "ready"
  | "disposed";

export class ExtractorDisposedError extends Error {
  constructor(name: string) {
    super(`Pose extractor "${name}" has been disposed`);
    this.name = "ExtractorDisposedError";
  }
}

/**
 * Owns one expensive pose extractor. Initialisation runs once however many
 * callers race for it, and `extract` calls run strictly one after another.
 */
export class ExclusiveExtractor<TImage = unknown>
  implements PoseExtractor<TImage>
{
  readonly name: string;

  private readonly inner: PoseExtractor<TImage>;

  private state: ExclusiveExtractorState = "idle";

  private initialization: Promise<void> | null = null;

  private tail: Promise<unknown> = Promise.resolve();

  constructor(inner: PoseExtractor<TImage>) {
    this.inner = inner;
    this.name = inner.name;
  }

  getState(): ExclusiveExtractorState {
    return this.state;
  }

  initialize(): Promise<void> {
    if (this.state === "disposed") {
      return Promise.reject(new ExtractorDisposedError(this.name));
    }
    if (!this.initialization) {
      this.state = "initializing";
      this.initialization = this.inner.initialize().then(
        () => {
          if (this.state === "initializing") {
            this.state = "ready";
          }
          logger.info("Pose extractor ready", { extractor: this.name });
        },
        (error: unknown) => {
          // Allow a later retry after a failed start, unless disposed meanwhile.
          if (this.state === "initializing") {
            this.initialization = null;
            this.state = "idle";
          }
          logger.error("Pose extractor failed to initialise", {
            extractor: this.name,
            ...describeError(error),
          });
          throw error;
        },
      );
    }
    return this.initialization;
  }

  extract(frame: DecodedFrame<TImage>): Promise<PoseLandmarks | null> {
    const run = async () => {
      if (this.state === "disposed") {
        throw new ExtractorDisposedError(this.name);
      }
      await this.initialize();
      return this.inner.extract(frame);
    };

    const result = this.tail.then(run, run);
    this.tail = result.catch(() => undefined);
    return result;
  }

  async dispose(): Promise<void> {
    if (this.state === "disposed") {
      return;
    }
    const pending = this.initialization;
    this.state = "disposed";
    // Let in-flight inferences finish before releasing the model.
    await this.tail;
    if (!pending) {
      return;
    }
    const started = await pending.then(
      () => true,
      () => false,
    );
    if (started) {
      await this.inner.dispose();
      logger.debug("Pose extractor disposed", { extractor: this.name });
    }
  }
}
