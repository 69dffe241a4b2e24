import {
  clamp,
  getPrefixedEnvVar,
  parseChoiceEnv,
  parseNumericEnv,
} from "../../shared/env";
import {
  DEFAULT_LANGUAGE,
  SUPPORTED_LANGUAGES,
  type SupportedLanguage,
} from "../../shared/i18n/config";
import { isFiniteNumber, isRecord } from "../../shared/validation/guards";

export type SeverityBand = {
  /** Averages strictly above this are at least `attention`. */
  attention: number;
  /** Averages strictly above this are `problem`. */
  problem: number;
};

export type OrderingPolicy = "reject" | "reorder";

export const ORDERING_POLICIES = ["reject", "reorder"] as const;

export type AnalysisConfig = {
  visibilityThreshold: number;
  hipShiftThreshold: SeverityBand;
  kneeAsymmetryThreshold: SeverityBand;
  neutralWindowSize: number;
  neutralTolerance: number;
  sideEpsilonDeg: number;
  ordering: OrderingPolicy;
  language: SupportedLanguage;
};

export type AnalysisConfigOverrides = Partial<
  Omit<AnalysisConfig, "hipShiftThreshold" | "kneeAsymmetryThreshold">
> & {
  hipShiftThreshold?: Partial<SeverityBand>;
  kneeAsymmetryThreshold?: Partial<SeverityBand>;
};

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// Published clinical bands: 1.5% and 2% of frame width / angle ratio.
const DEFAULT_SEVERITY_BAND: SeverityBand = {
  attention: 0.015,
  problem: 0.02,
};

const DEFAULTS: AnalysisConfig = {
  visibilityThreshold: 0.5,
  hipShiftThreshold: DEFAULT_SEVERITY_BAND,
  kneeAsymmetryThreshold: DEFAULT_SEVERITY_BAND,
  neutralWindowSize: 15,
  neutralTolerance: 0.005,
  sideEpsilonDeg: 2,
  ordering: "reject",
  language: DEFAULT_LANGUAGE,
};

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> =
  Object.freeze(DEFAULTS);

const clampBandValue = (value: number | undefined, fallback: number) => {
  if (!isFiniteNumber(value)) {
    return fallback;
  }
  return clamp(value, 0, 1);
};

const mergeBand = (
  base: SeverityBand,
  overrides?: Partial<SeverityBand>,
): SeverityBand => {
  const attention = clampBandValue(overrides?.attention, base.attention);
  const problem = clampBandValue(overrides?.problem, base.problem);
  return {
    attention,
    problem: Math.max(problem, attention),
  };
};

const cloneAnalysisConfig = (config: AnalysisConfig): AnalysisConfig => {
  return {
    ...config,
    hipShiftThreshold: { ...config.hipShiftThreshold },
    kneeAsymmetryThreshold: { ...config.kneeAsymmetryThreshold },
  };
};

export const mergeAnalysisConfig = (
  config: AnalysisConfig,
  overrides?: AnalysisConfigOverrides | null,
): AnalysisConfig => {
  const next = cloneAnalysisConfig(config);
  if (!overrides) {
    return next;
  }

  if (isFiniteNumber(overrides.visibilityThreshold)) {
    next.visibilityThreshold = clamp(overrides.visibilityThreshold, 0, 1);
  }
  if (overrides.hipShiftThreshold) {
    next.hipShiftThreshold = mergeBand(
      next.hipShiftThreshold,
      overrides.hipShiftThreshold,
    );
  }
  if (overrides.kneeAsymmetryThreshold) {
    next.kneeAsymmetryThreshold = mergeBand(
      next.kneeAsymmetryThreshold,
      overrides.kneeAsymmetryThreshold,
    );
  }
  if (isFiniteNumber(overrides.neutralWindowSize)) {
    next.neutralWindowSize = Math.round(
      clamp(overrides.neutralWindowSize, 1, 100_000),
    );
  }
  if (isFiniteNumber(overrides.neutralTolerance)) {
    next.neutralTolerance = clamp(overrides.neutralTolerance, 0, 1);
  }
  if (isFiniteNumber(overrides.sideEpsilonDeg)) {
    next.sideEpsilonDeg = clamp(overrides.sideEpsilonDeg, 0, 90);
  }
  if (overrides.ordering !== undefined) {
    next.ordering = overrides.ordering;
  }
  if (overrides.language !== undefined) {
    next.language = overrides.language;
  }

  return next;
};

/**
 * Environment overrides. Severity bands are deliberately absent: they only
 * change through an explicit configuration object.
 */
export const createEnvOverrides = (): AnalysisConfigOverrides | null => {
  const overrides: AnalysisConfigOverrides = {};

  const visibilityThreshold = parseNumericEnv(
    getPrefixedEnvVar("VISIBILITY_THRESHOLD"),
    { min: 0, max: 1 },
  );
  if (visibilityThreshold !== null) {
    overrides.visibilityThreshold = visibilityThreshold;
  }

  const neutralWindowSize = parseNumericEnv(
    getPrefixedEnvVar("NEUTRAL_WINDOW_SIZE"),
    { min: 1, max: 100_000, integer: true },
  );
  if (neutralWindowSize !== null) {
    overrides.neutralWindowSize = neutralWindowSize;
  }

  const neutralTolerance = parseNumericEnv(
    getPrefixedEnvVar("NEUTRAL_TOLERANCE"),
    { min: 0, max: 1 },
  );
  if (neutralTolerance !== null) {
    overrides.neutralTolerance = neutralTolerance;
  }

  const sideEpsilonDeg = parseNumericEnv(
    getPrefixedEnvVar("SIDE_EPSILON_DEG"),
    { min: 0, max: 90 },
  );
  if (sideEpsilonDeg !== null) {
    overrides.sideEpsilonDeg = sideEpsilonDeg;
  }

  const ordering = parseChoiceEnv(
    getPrefixedEnvVar("ORDERING"),
    ORDERING_POLICIES,
  );
  if (ordering !== null) {
    overrides.ordering = ordering;
  }

  const language = parseChoiceEnv(
    getPrefixedEnvVar("LANGUAGE"),
    SUPPORTED_LANGUAGES,
  );
  if (language !== null) {
    overrides.language = language;
  }

  return Object.keys(overrides).length > 0 ? overrides : null;
};

/** Defaults, then environment, then explicit overrides. */
export const resolveAnalysisConfig = (
  overrides?: AnalysisConfigOverrides | null,
  options: { useEnv?: boolean } = {},
): Readonly<AnalysisConfig> => {
  const withEnv =
    options.useEnv === false
      ? cloneAnalysisConfig(DEFAULT_ANALYSIS_CONFIG)
      : mergeAnalysisConfig(DEFAULT_ANALYSIS_CONFIG, createEnvOverrides());
  const resolved = mergeAnalysisConfig(withEnv, overrides);
  Object.freeze(resolved.hipShiftThreshold);
  Object.freeze(resolved.kneeAsymmetryThreshold);
  return Object.freeze(resolved);
};

const readNumber = (
  source: Record<string, unknown>,
  key: string,
): number | undefined => {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isFiniteNumber(value)) {
    throw new ConfigurationError(`"${key}" must be a finite number`);
  }
  return value;
};

const readBand = (
  source: Record<string, unknown>,
  key: string,
): Partial<SeverityBand> | undefined => {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(
      `"${key}" must be an object with "attention" and/or "problem"`,
    );
  }
  const band: Partial<SeverityBand> = {};
  const attention = readNumber(value, "attention");
  const problem = readNumber(value, "problem");
  if (attention !== undefined) {
    band.attention = attention;
  }
  if (problem !== undefined) {
    band.problem = problem;
  }
  return band;
};

const readChoice = <TChoice extends string>(
  source: Record<string, unknown>,
  key: string,
  choices: readonly TChoice[],
): TChoice | undefined => {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigurationError(
      `"${key}" must be one of ${choices.join(", ")}`,
    );
  }
  return match;
};

const SURFACE_KEYS = new Set([
  "visibility_threshold",
  "hip_shift_threshold",
  "knee_asymmetry_threshold",
  "neutral_window_size",
  "neutral_tolerance",
  "side_epsilon_deg",
  "ordering",
  "language",
]);

/** Parses the snake_case configuration surface (e.g. a JSON config file). */
export const parseAnalysisConfigSurface = (
  raw: unknown,
): AnalysisConfigOverrides => {
  if (!isRecord(raw) || Array.isArray(raw)) {
    throw new ConfigurationError("Analysis configuration must be an object");
  }

  const unknownKeys = Object.keys(raw).filter((key) => !SURFACE_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigurationError(
      `Unrecognized configuration option(s): ${unknownKeys.join(", ")}`,
    );
  }

  return {
    visibilityThreshold: readNumber(raw, "visibility_threshold"),
    hipShiftThreshold: readBand(raw, "hip_shift_threshold"),
    kneeAsymmetryThreshold: readBand(raw, "knee_asymmetry_threshold"),
    neutralWindowSize: readNumber(raw, "neutral_window_size"),
    neutralTolerance: readNumber(raw, "neutral_tolerance"),
    sideEpsilonDeg: readNumber(raw, "side_epsilon_deg"),
    ordering: readChoice(raw, "ordering", ORDERING_POLICIES),
    language: readChoice(raw, "language", SUPPORTED_LANGUAGES),
  };
};
