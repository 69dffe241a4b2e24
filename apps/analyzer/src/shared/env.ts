export const ENV_PREFIX = "STANCECHECK_";

export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  if (typeof value !== "string") {
    return defaultValue;
  }
  const normalised = value.trim().toLowerCase();
  switch (normalised) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return defaultValue;
  }
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

export const parseChoiceEnv = <TChoice extends string>(
  value: string | null | undefined,
  choices: readonly TChoice[],
): TChoice | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return choices.find((choice) => choice === trimmed) ?? null;
};

export const getEnvVar = (key: string): string | undefined => {
  if (typeof process !== "undefined" && process?.env?.[key] !== undefined) {
    return process.env[key];
  }
  return undefined;
};

/** Reads `STANCECHECK_<name>`. */
export const getPrefixedEnvVar = (name: string): string | undefined => {
  return getEnvVar(`${ENV_PREFIX}${name}`);
};
