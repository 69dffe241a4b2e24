import chalk, { type ChalkInstance } from "chalk";
import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { AnalysisEngine } from "../engine";
import {
  ConfigurationError,
  parseAnalysisConfigSurface,
  type AnalysisConfigOverrides,
} from "../engine/config/analysis-config";
import { isAnalysisError } from "../engine/errors";
import { loadKeypointStream } from "../extraction/keypoint-stream";
import { generateSyntheticSquat } from "../extraction/synthetic-squat";
import {
  createReportTranslator,
  isSupportedLanguage,
  SUPPORTED_LANGUAGES,
  type ReportTranslator,
  type SupportedLanguage,
} from "../shared/i18n/config";
import { describeError, getLogger } from "../shared/logger";
import type { Frame } from "../shared/types/landmarks";
import type { AnalysisReport, Severity } from "../shared/types/report";

const logger = getLogger("cli", "cli");

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  usage: 2,
  cancelled: 130,
} as const;

export const USAGE = [
  "Usage: stancecheck <keypoints.json> [options]",
  "       stancecheck --demo [options]",
  "",
  "Options:",
  "  --config <file>   JSON analysis configuration (snake_case keys)",
  `  --lang <code>     Report language (${SUPPORTED_LANGUAGES.join(", ")})`,
  "  --json            Print the report as JSON",
  "  --demo            Analyse a generated squat recording",
  "  -h, --help        Show this help",
].join("\n");

export type CliOptions = {
  input: string | null;
  configPath: string | null;
  language: SupportedLanguage | null;
  json: boolean;
  demo: boolean;
  help: boolean;
};

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  chalk?: ChalkInstance;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const parseCliArgs = (argv: string[]): CliOptions => {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    throw new UsageError(`Expected one keypoints file, got ${positionals.length}`);
  }

  const lang = values.lang ?? null;
  if (lang !== null && !isSupportedLanguage(lang)) {
    throw new UsageError(
      `Unsupported language "${lang}" (expected ${SUPPORTED_LANGUAGES.join(", ")})`,
    );
  }

  const options: CliOptions = {
    input: positionals[0] ?? null,
    configPath: values.config ?? null,
    language: lang,
    json: values.json ?? false,
    demo: values.demo ?? false,
    help: values.help ?? false,
  };

  if (!options.help && !options.demo && options.input === null) {
    throw new UsageError("Missing keypoints file (or pass --demo)");
  }
  if (options.demo && options.input !== null) {
    throw new UsageError("--demo does not take a keypoints file");
  }
  return options;
};

const parseCommandLine = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: "string" },
      lang: { type: "string" },
      json: { type: "boolean" },
      demo: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

export const loadConfigFile = async (
  filePath: string,
): Promise<AnalysisConfigOverrides> => {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Unable to load ${filePath}: ${reason}`);
  }
  return parseAnalysisConfigSurface(raw);
};

const paintSeverity = (
  paint: ChalkInstance,
  severity: Severity,
): string => {
  const label = severity.toUpperCase();
  switch (severity) {
    case "problem":
      return paint.whiteBright.bgRed.bold(` ${label} `);
    case "attention":
      return paint.black.bgYellow.bold(` ${label} `);
    default:
      return paint.black.bgGreen.bold(` ${label} `);
  }
};

const formatMetric = (value: number) => value.toFixed(4);

export const formatReport = (
  report: AnalysisReport,
  translate: ReportTranslator,
  paint: ChalkInstance = chalk,
): string => {
  const { summary, frame_stats: stats } = report;
  const lines = [
    paint.bold(translate("cli.title")),
    `  ${translate("cli.severity")}: ${paintSeverity(paint, report.severity)}`,
    `  ${translate("cli.side")}: ${report.compensating_side}`,
    `  ${translate("cli.avgHipShift")}: ${formatMetric(summary.avg_hip_shift)}`,
    `  ${translate("cli.maxHipShift")}: ${formatMetric(summary.max_hip_shift)}`,
    `  ${translate("cli.avgKneeAsymmetry")}: ${formatMetric(summary.avg_knee_asymmetry)}`,
    `  ${translate("cli.maxKneeAsymmetry")}: ${formatMetric(summary.max_knee_asymmetry)}`,
    `  ${translate("cli.keyMoments")}:`,
    ...report.key_moments.map(
      (moment) =>
        `    ${moment.label.padEnd(18)} frame ${moment.frame_index} @ ${moment.timestamp.toFixed(2)}s`,
    ),
    `  ${translate("cli.frames")}: ${stats.analyzed}/${stats.received}`,
    "",
    paint.cyan(report.message),
    `${translate("cli.recommendation")}: ${report.recommendation}`,
  ];
  return lines.join("\n");
};

export type RunCliOptions = {
  signal?: AbortSignal;
};

/** Runs one analysis from command-line arguments and returns the exit code. */
export const runCli = async (
  argv: string[],
  io: CliIo,
  runOptions: RunCliOptions = {},
): Promise<number> => {
  const paint = io.chalk ?? chalk;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${paint.red(error.message)}\n\n${USAGE}`);
      return EXIT_CODES.usage;
    }
    throw error;
  }

  if (options.help) {
    io.stdout(USAGE);
    return EXIT_CODES.success;
  }

  let overrides: AnalysisConfigOverrides = {};
  if (options.configPath) {
    try {
      overrides = await loadConfigFile(options.configPath);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        io.stderr(paint.red(error.message));
        return EXIT_CODES.usage;
      }
      throw error;
    }
  }
  if (options.language) {
    overrides = { ...overrides, language: options.language };
  }

  let frames: Frame[];
  try {
    frames = options.demo
      ? generateSyntheticSquat()
      : await loadKeypointStream(options.input ?? "");
  } catch (error) {
    if (isAnalysisError(error)) {
      io.stderr(paint.red(error.message));
      return EXIT_CODES.failure;
    }
    throw error;
  }

  const engine = new AnalysisEngine({ config: overrides });
  const outcome = engine.run(frames, { signal: runOptions.signal });

  switch (outcome.status) {
    case "completed": {
      const translate = createReportTranslator(engine.config.language);
      io.stdout(
        options.json
          ? JSON.stringify(outcome.report, null, 2)
          : formatReport(outcome.report, translate, paint),
      );
      return EXIT_CODES.success;
    }
    case "cancelled":
      io.stderr(paint.yellow(`Analysis cancelled (${outcome.reason})`));
      return EXIT_CODES.cancelled;
    case "failed":
      logger.debug("CLI run failed", describeError(outcome.error));
      io.stderr(paint.red(outcome.error.message));
      return EXIT_CODES.failure;
    default:
      return EXIT_CODES.failure;
  }
};
