export type RuntimeEnv = Record<string, string | undefined>;

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

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

export const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  if (TRUTHY.has(normalised)) {
    return true;
  }
  if (FALSY.has(normalised)) {
    return false;
  }
  return null;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  return parseOptionalBoolean(value) ?? defaultValue;
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

export const parseStringEnv = (
  value: string | null | undefined,
): string | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const getEnvVar = (
  key: string,
  env: RuntimeEnv = process.env,
): string | undefined => {
  return env[key];
};
