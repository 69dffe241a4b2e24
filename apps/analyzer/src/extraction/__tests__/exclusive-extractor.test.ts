import { describe, expect, it, vi } from "vitest";
import type { DecodedFrame, PoseExtractor } from "../../shared/types/extractor";
import type { PoseLandmarks } from "../../shared/types/landmarks";
import { ExclusiveExtractor, ExtractorDisposedError } from "../exclusive-extractor";

const POSE: PoseLandmarks = { landmarks: [] };

const decoded = (index: number): DecodedFrame<string> => ({
  index,
  timestamp: index / 30,
  image: `frame-${index}`,
});

const createFakeExtractor = (delayMs = 5) => {
  let active = 0;
  let maxActive = 0;
  const order: string[] = [];

  const extractor: PoseExtractor<string> = {
    name: "fake",
    initialize: vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }),
    extract: vi.fn(async (frame: DecodedFrame<string>) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      order.push(`start:${frame.index}`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      order.push(`end:${frame.index}`);
      active -= 1;
      if (frame.image === "frame-13") {
        throw new Error("inference failed");
      }
      return POSE;
    }),
    dispose: vi.fn(async () => undefined),
  };

  return { extractor, order, getMaxActive: () => maxActive };
};

describe("ExclusiveExtractor", () => {
  it("initialises the wrapped extractor once", async () => {
    const { extractor } = createFakeExtractor();
    const exclusive = new ExclusiveExtractor(extractor);

    await Promise.all([exclusive.initialize(), exclusive.initialize()]);
    await exclusive.extract(decoded(0));

    expect(extractor.initialize).toHaveBeenCalledTimes(1);
    expect(exclusive.getState()).toBe("ready");
  });

  it("never runs two inferences at once", async () => {
    const { extractor, order, getMaxActive } = createFakeExtractor();
    const exclusive = new ExclusiveExtractor(extractor);

    await Promise.all([0, 1, 2].map((index) => exclusive.extract(decoded(index))));

    expect(getMaxActive()).toBe(1);
    expect(order).toEqual([
      "start:0",
      "end:0",
      "start:1",
      "end:1",
      "start:2",
      "end:2",
    ]);
  });

  it("keeps the queue alive after a failed inference", async () => {
    const { extractor } = createFakeExtractor();
    const exclusive = new ExclusiveExtractor(extractor);

    const failing = exclusive.extract(decoded(13));
    const following = exclusive.extract(decoded(14));

    await expect(failing).rejects.toThrow("inference failed");
    await expect(following).resolves.toBe(POSE);
  });

  it("allows a retry after initialisation fails", async () => {
    const { extractor } = createFakeExtractor();
    vi.mocked(extractor.initialize).mockRejectedValueOnce(new Error("no model"));
    const exclusive = new ExclusiveExtractor(extractor);

    await expect(exclusive.initialize()).rejects.toThrow("no model");
    expect(exclusive.getState()).toBe("idle");
    await expect(exclusive.initialize()).resolves.toBeUndefined();
    expect(extractor.initialize).toHaveBeenCalledTimes(2);
  });

  it("disposes once and refuses work afterwards", async () => {
    const { extractor } = createFakeExtractor();
    const exclusive = new ExclusiveExtractor(extractor);
    await exclusive.initialize();

    await exclusive.dispose();
    await exclusive.dispose();

    expect(extractor.dispose).toHaveBeenCalledTimes(1);
    await expect(exclusive.extract(decoded(0))).rejects.toBeInstanceOf(
      ExtractorDisposedError,
    );
    await expect(exclusive.initialize()).rejects.toBeInstanceOf(
      ExtractorDisposedError,
    );
  });

  it("stays disposed when a pending initialisation fails", async () => {
    const { extractor } = createFakeExtractor();
    vi.mocked(extractor.initialize).mockRejectedValueOnce(new Error("no model"));
    const exclusive = new ExclusiveExtractor(extractor);

    const starting = exclusive.initialize();
    const disposing = exclusive.dispose();

    await expect(starting).rejects.toThrow("no model");
    await disposing;

    expect(exclusive.getState()).toBe("disposed");
    expect(extractor.dispose).not.toHaveBeenCalled();
    await expect(exclusive.initialize()).rejects.toBeInstanceOf(
      ExtractorDisposedError,
    );
    expect(extractor.initialize).toHaveBeenCalledTimes(1);
  });

  it("skips disposing an extractor that never started", async () => {
    const { extractor } = createFakeExtractor();
    await new ExclusiveExtractor(extractor).dispose();

    expect(extractor.dispose).not.toHaveBeenCalled();
  });
});
