import { Chalk } from "chalk";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { buildFrame } from "../../__tests__/frame-fixtures";
import { AnalysisEngine } from "../../engine";
import { createReportTranslator } from "../../shared/i18n/config";
import type { Frame } from "../../shared/types/landmarks";
import {
  EXIT_CODES,
  formatReport,
  parseCliArgs,
  runCli,
  USAGE,
  UsageError,
} from "../cli";

const plain = new Chalk({ level: 0 });

const createIo = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    io: {
      stdout: (text: string) => stdout.push(text),
      stderr: (text: string) => stderr.push(text),
      chalk: plain,
    },
    stdout,
    stderr,
  };
};

const unevenSquat = (): Frame[] =>
  Array.from({ length: 10 }, (_, i) =>
    buildFrame({ timestamp: i / 10, kneeLeft: 150, kneeRight: i < 5 ? 150 : 100 }),
  );

const writeTemp = (name: string, content: string) => {
  const directory = mkdtempSync(path.join(tmpdir(), "stancecheck-cli-"));
  const filePath = path.join(directory, name);
  writeFileSync(filePath, content);
  return filePath;
};

describe("parseCliArgs", () => {
  it("parses a file with options", () => {
    expect(
      parseCliArgs(["squat.json", "--lang", "ko-KR", "--json", "--config", "c.json"]),
    ).toEqual({
      input: "squat.json",
      configPath: "c.json",
      language: "ko-KR",
      json: true,
      demo: false,
      help: false,
    });
  });

  it("rejects invalid combinations", () => {
    expect(() => parseCliArgs([])).toThrow(UsageError);
    expect(() => parseCliArgs(["a.json", "b.json"])).toThrow(
      "Expected one keypoints file, got 2",
    );
    expect(() => parseCliArgs(["--demo", "a.json"])).toThrow(UsageError);
    expect(() => parseCliArgs(["a.json", "--lang", "de-DE"])).toThrow(UsageError);
    expect(() => parseCliArgs(["a.json", "--verbose"])).toThrow(UsageError);
  });
});

describe("formatReport", () => {
  it("prints a readable summary", () => {
    const report = new AnalysisEngine({ useEnv: false }).analyze(unevenSquat());
    const lines = formatReport(
      report,
      createReportTranslator("en-US"),
      plain,
    ).split("\n");

    expect(lines).toEqual([
      "Squat compensation report",
      "  Severity:  PROBLEM ",
      "  Compensating side: left",
      "  Average hip shift: 0.0000",
      "  Max hip shift: 0.0000",
      "  Average knee asymmetry: 0.1667",
      "  Max knee asymmetry: 0.3333",
      "  Key moments:",
      "    neutral            frame 0 @ 0.00s",
      "    peak_compensation  frame 5 @ 0.50s",
      "  Frames analysed: 10/10",
      "",
      "Compensation detected: load shifts away from the left leg at 30° knee flexion.",
      "Recommendation: Focus on slow, symmetrical knee loading.",
    ]);
  });
});

describe("runCli", () => {
  it("prints usage on --help", async () => {
    const { io, stdout } = createIo();

    await expect(runCli(["--help"], io)).resolves.toBe(EXIT_CODES.success);
    expect(stdout).toEqual([USAGE]);
  });

  it("exits with 2 on usage errors", async () => {
    const { io, stderr } = createIo();

    await expect(runCli([], io)).resolves.toBe(EXIT_CODES.usage);
    expect(stderr[0]).toBe(
      `Missing keypoints file (or pass --demo)\n\n${USAGE}`,
    );
  });

  it("analyses a keypoints file as JSON", async () => {
    const { io, stdout } = createIo();
    const input = writeTemp("squat.json", JSON.stringify(unevenSquat()));

    await expect(runCli([input, "--json"], io)).resolves.toBe(EXIT_CODES.success);
    const report: unknown = JSON.parse(stdout[0] ?? "");
    expect(report).toMatchObject({
      severity: "problem",
      compensating_side: "left",
      frame_stats: { received: 10, analyzed: 10 },
    });
  });

  it("applies a configuration file and a language", async () => {
    const { io, stdout } = createIo();
    const input = writeTemp("squat.json", JSON.stringify(unevenSquat()));
    const config = writeTemp("config.json", JSON.stringify({ side_epsilon_deg: 60 }));

    await expect(
      runCli([input, "--config", config, "--lang", "ko-KR"], io),
    ).resolves.toBe(EXIT_CODES.success);
    const output = stdout[0] ?? "";
    expect(output.split("\n")).toContain("  보상 측: none");
    expect(output).toContain(
      "보상 동작 감지: 무릎 굴곡 55°에서 특정 방향 없이 하중이 이동합니다.",
    );
  });

  it("rejects an invalid configuration file", async () => {
    const { io, stderr } = createIo();
    const config = writeTemp("config.json", JSON.stringify({ speed: 2 }));

    await expect(runCli(["--demo", "--config", config], io)).resolves.toBe(
      EXIT_CODES.usage,
    );
    expect(stderr).toEqual(["Unrecognized configuration option(s): speed"]);
  });

  it("exits with 1 when the stream cannot be read", async () => {
    const { io, stderr } = createIo();
    const input = writeTemp("squat.json", JSON.stringify({ frames: [] }));

    await expect(runCli([input], io)).resolves.toBe(EXIT_CODES.failure);
    expect(stderr).toHaveLength(1);
  });

  it("exits with 1 when no frame is usable", async () => {
    const { io, stderr } = createIo();
    const frames = [buildFrame({ timestamp: 0, visibility: 0.1 })];
    const input = writeTemp("squat.json", JSON.stringify(frames));

    await expect(runCli([input], io)).resolves.toBe(EXIT_CODES.failure);
    expect(stderr).toEqual(["No usable frames in keypoint stream (1 received)"]);
  });

  it("exits with 130 when cancelled", async () => {
    const { io, stderr } = createIo();
    const controller = new AbortController();
    controller.abort();

    await expect(
      runCli(["--demo"], io, { signal: controller.signal }),
    ).resolves.toBe(EXIT_CODES.cancelled);
    expect(stderr).toEqual(["Analysis cancelled (aborted)"]);
  });

  it("runs the demo stream", async () => {
    const { io, stdout } = createIo();

    await expect(runCli(["--demo"], io)).resolves.toBe(EXIT_CODES.success);
    expect(stdout[0]?.split("\n")[1]).toBe("  Severity:  PROBLEM ");
  });
});
