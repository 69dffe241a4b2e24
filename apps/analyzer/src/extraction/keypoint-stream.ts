import { readFile } from "node:fs/promises";
import { KeypointStreamFormatError } from "../engine/errors";
import type { Frame, LandmarkSet } from "../shared/types/landmarks";
import {
  isFiniteNumber,
  isJointName,
  isLandmarkLike,
  isRecord,
  toLandmark,
} from "../shared/validation/guards";

/*
 * Two layouts are accepted:
 *   - recorded keypoints: `[{ frame, time, keypoints: [{ name, x, y, z, visibility }] }]`,
 *     optionally wrapped as `{ keypoints_data: [...] }`;
 *   - engine frames: `[{ timestamp, landmarks: { left_hip: {...}, ... }, index? }]`.
 * Landmark names outside the tracked joints are ignored.
 */

const readFrameIndex = (
  value: unknown,
  key: string,
  position: number,
): number | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isFiniteNumber(value) || !Number.isInteger(value) || value < 0) {
    throw new KeypointStreamFormatError(
      `"${key}" must be a non-negative integer`,
      position,
    );
  }
  return value;
};

const readTimestamp = (
  value: unknown,
  key: string,
  position: number,
): number => {
  if (typeof value !== "number") {
    throw new KeypointStreamFormatError(`"${key}" must be a number`, position);
  }
  return value;
};

const parseKeypointList = (value: unknown, position: number): LandmarkSet => {
  if (!Array.isArray(value)) {
    throw new KeypointStreamFormatError('"keypoints" must be a list', position);
  }

  const landmarks: LandmarkSet = {};
  value.forEach((entry: unknown, keypointPosition) => {
    if (!isRecord(entry) || typeof entry.name !== "string") {
      throw new KeypointStreamFormatError(
        `keypoint ${keypointPosition} must be an object with a "name"`,
        position,
      );
    }
    const { name } = entry;
    if (!isJointName(name)) {
      return;
    }
    if (!isLandmarkLike(entry)) {
      throw new KeypointStreamFormatError(
        `keypoint "${name}" needs numeric x and y`,
        position,
      );
    }
    landmarks[name] = toLandmark(entry);
  });
  return landmarks;
};

const parseLandmarkMap = (value: unknown, position: number): LandmarkSet => {
  if (!isRecord(value) || Array.isArray(value)) {
    throw new KeypointStreamFormatError(
      '"landmarks" must be an object keyed by joint name',
      position,
    );
  }

  const landmarks: LandmarkSet = {};
  for (const [name, entry] of Object.entries(value)) {
    if (!isJointName(name)) {
      continue;
    }
    if (!isLandmarkLike(entry)) {
      throw new KeypointStreamFormatError(
        `landmark "${name}" needs numeric x and y`,
        position,
      );
    }
    landmarks[name] = toLandmark(entry);
  }
  return landmarks;
};

const parseFrame = (entry: unknown, position: number): Frame => {
  if (!isRecord(entry) || Array.isArray(entry)) {
    throw new KeypointStreamFormatError("frame must be an object", position);
  }

  if ("keypoints" in entry) {
    const frame: Frame = {
      timestamp: readTimestamp(entry.time, "time", position),
      landmarks: parseKeypointList(entry.keypoints, position),
    };
    const index = readFrameIndex(entry.frame, "frame", position);
    if (index !== undefined) {
      frame.index = index;
    }
    return frame;
  }

  if ("landmarks" in entry) {
    const frame: Frame = {
      timestamp: readTimestamp(entry.timestamp, "timestamp", position),
      landmarks: parseLandmarkMap(entry.landmarks, position),
    };
    const index = readFrameIndex(entry.index, "index", position);
    if (index !== undefined) {
      frame.index = index;
    }
    return frame;
  }

  throw new KeypointStreamFormatError(
    'frame needs either "keypoints" or "landmarks"',
    position,
  );
};

export const parseKeypointStream = (raw: unknown): Frame[] => {
  const entries = Array.isArray(raw)
    ? raw
    : isRecord(raw) && Array.isArray(raw.keypoints_data)
      ? raw.keypoints_data
      : null;

  if (!entries) {
    throw new KeypointStreamFormatError(
      'Keypoint stream must be a list of frames or an object with "keypoints_data"',
    );
  }

  return entries.map((entry: unknown, position) => parseFrame(entry, position));
};

export const loadKeypointStream = async (filePath: string): Promise<Frame[]> => {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KeypointStreamFormatError(`Unable to read ${filePath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KeypointStreamFormatError(`Invalid JSON in ${filePath}: ${reason}`);
  }

  return parseKeypointStream(raw);
};
