import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { KeypointStreamFormatError } from "../../engine/errors";
import { loadKeypointStream, parseKeypointStream } from "../keypoint-stream";

const recordedFrame = {
  frame: 4,
  time: 0.133,
  keypoints: [
    { name: "nose", x: 0.5, y: 0.15, z: 0, visibility: 1 },
    { name: "left_hip", x: 0.43, y: 0.5, z: -0.1, visibility: 0.9 },
    { name: "left_wrist", x: 0.3, y: 0.5, z: 0, visibility: 0.9 },
  ],
};

describe("parseKeypointStream", () => {
  it("reads recorded keypoint lists", () => {
    expect(parseKeypointStream([recordedFrame])).toEqual([
      {
        timestamp: 0.133,
        index: 4,
        landmarks: {
          nose: { x: 0.5, y: 0.15, z: 0, visibility: 1 },
          left_hip: { x: 0.43, y: 0.5, z: -0.1, visibility: 0.9 },
        },
      },
    ]);
  });

  it("unwraps keypoints_data", () => {
    const frames = parseKeypointStream({
      keypoints_data: [recordedFrame],
      fps: 30,
    });

    expect(frames).toHaveLength(1);
    expect(frames[0]?.index).toBe(4);
  });

  it("reads engine-native frames and fills optional fields", () => {
    const frames = parseKeypointStream([
      {
        timestamp: 1.5,
        landmarks: { right_knee: { x: 0.58, y: 0.65 }, unknown_joint: { x: 1 } },
      },
    ]);

    expect(frames).toEqual([
      {
        timestamp: 1.5,
        landmarks: { right_knee: { x: 0.58, y: 0.65, z: 0, visibility: 1 } },
      },
    ]);
  });

  it("names the offending frame", () => {
    expect(() =>
      parseKeypointStream([recordedFrame, { frame: 6, keypoints: [] }]),
    ).toThrow('Frame 1: "time" must be a number');
    expect(() =>
      parseKeypointStream([
        { time: 0, keypoints: [{ name: "left_knee", x: "0.4", y: 0.6 }] },
      ]),
    ).toThrow('Frame 0: keypoint "left_knee" needs numeric x and y');
    expect(() => parseKeypointStream([{ time: 0, frame: -1, keypoints: [] }])).toThrow(
      'Frame 0: "frame" must be a non-negative integer',
    );
    expect(() => parseKeypointStream([{ time: 0 }])).toThrow(
      'Frame 0: frame needs either "keypoints" or "landmarks"',
    );
  });

  it("rejects other top-level shapes", () => {
    expect(() => parseKeypointStream({ frames: [] })).toThrow(
      KeypointStreamFormatError,
    );
    expect(() => parseKeypointStream("[]")).toThrow(KeypointStreamFormatError);
  });
});

describe("loadKeypointStream", () => {
  const writeTemp = (content: string) => {
    const directory = mkdtempSync(path.join(tmpdir(), "keypoints-"));
    const filePath = path.join(directory, "stream.json");
    writeFileSync(filePath, content);
    return filePath;
  };

  it("loads frames from a JSON file", async () => {
    const filePath = writeTemp(JSON.stringify({ keypoints_data: [recordedFrame] }));

    await expect(loadKeypointStream(filePath)).resolves.toHaveLength(1);
  });

  it("reports invalid JSON as a format error", async () => {
    const filePath = writeTemp("{ not json");

    await expect(loadKeypointStream(filePath)).rejects.toBeInstanceOf(
      KeypointStreamFormatError,
    );
  });

  it("reports a missing file as a format error", async () => {
    await expect(
      loadKeypointStream(path.join(tmpdir(), "does-not-exist", "stream.json")),
    ).rejects.toBeInstanceOf(KeypointStreamFormatError);
  });
});
