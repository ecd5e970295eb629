import type {
  ActivityPing,
  PresenceSampleInput,
  RotationMatrix3,
} from "../types/signals";

export type KeywordLists = {
  productive: string[];
  unproductive: string[];
};

const ACTIVITY_SOURCE_LOOKUP: Record<NonNullable<ActivityPing["source"]>, true> =
  {
    keyboard: true,
    mouse: true,
    other: true,
  };

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

export const isOptionalNumber = (
  value: unknown,
): value is number | null | undefined => {
  return value === null || value === undefined || isFiniteNumber(value);
};

export const isBoolean = (value: unknown): value is boolean => {
  return typeof value === "boolean";
};

export const isStringArray = (value: unknown): value is string[] => {
  return (
    Array.isArray(value) && value.every((entry) => typeof entry === "string")
  );
};

export const isKeywordLists = (value: unknown): value is KeywordLists => {
  if (!isRecord(value)) {
    return false;
  }

  return isStringArray(value.productive) && isStringArray(value.unproductive);
};

const isMatrixRow = (value: unknown): value is [number, number, number] => {
  return (
    Array.isArray(value) && value.length === 3 && value.every(isFiniteNumber)
  );
};

export const isRotationMatrix = (value: unknown): value is RotationMatrix3 => {
  return Array.isArray(value) && value.length === 3 && value.every(isMatrixRow);
};

export const isPresenceSampleInput = (
  value: unknown,
): value is PresenceSampleInput => {
  if (!isRecord(value)) {
    return false;
  }

  const { timestamp, faceDetected, yawDeg, pitchDeg, rotationMatrix } = value;

  if (!isBoolean(faceDetected)) {
    return false;
  }

  if (timestamp !== undefined && !isFiniteNumber(timestamp)) {
    return false;
  }

  if (
    !isOptionalNumber(yawDeg) ||
    !isOptionalNumber(pitchDeg)
  ) {
    return false;
  }

  if (
    rotationMatrix !== undefined &&
    rotationMatrix !== null &&
    !isRotationMatrix(rotationMatrix)
  ) {
    return false;
  }

  return true;
};

export const isActivityPing = (value: unknown): value is ActivityPing => {
  if (!isRecord(value)) {
    return false;
  }

  const { timestamp, source } = value;

  if (timestamp !== undefined && !isFiniteNumber(timestamp)) {
    return false;
  }

  return (
    source === undefined ||
    (typeof source === "string" && Object.hasOwn(ACTIVITY_SOURCE_LOOKUP, source))
  );
};
