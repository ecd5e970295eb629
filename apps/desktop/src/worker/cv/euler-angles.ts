import type { RotationMatrix3 } from "../../shared/types/signals";

export type HeadPose = {
  /** Rotation around the X axis, degrees. Positive tilts the face down. */
  pitchDeg: number;
  /** Rotation around the Y axis, degrees. Positive turns the face left. */
  yawDeg: number;
  /** Rotation around the Z axis, degrees. */
  rollDeg: number;
};

const ORTHONORMAL_EPSILON = 1e-5;
const DETERMINANT_EPSILON = 1e-3;

const clamp = (value: number, lower: number, upper: number): number => {
  return Math.max(lower, Math.min(upper, value));
};

const toDegrees = (radians: number): number => (radians * 180) / Math.PI;

const dot = (
  a: readonly [number, number, number],
  b: readonly [number, number, number],
): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];

export const isProperRotation = (matrix: RotationMatrix3): boolean => {
  const [r0, r1, r2] = matrix;

  const unitRows = [r0, r1, r2].every(
    (row) => Math.abs(Math.hypot(row[0], row[1], row[2]) - 1) < ORTHONORMAL_EPSILON,
  );
  if (!unitRows) {
    return false;
  }

  const orthogonal = [dot(r0, r1), dot(r0, r2), dot(r1, r2)].every(
    (product) => Math.abs(product) < ORTHONORMAL_EPSILON,
  );
  if (!orthogonal) {
    return false;
  }

  const determinant =
    r0[0] * (r1[1] * r2[2] - r1[2] * r2[1]) -
    r0[1] * (r1[0] * r2[2] - r1[2] * r2[0]) +
    r0[2] * (r1[0] * r2[1] - r1[1] * r2[0]);

  return Math.abs(determinant - 1) < DETERMINANT_EPSILON;
};

/**
 * Decomposes a head rotation (as reported by a face-landmark model) into
 * pitch/yaw/roll. Returns null for anything that is not a proper rotation.
 */
export const rotationMatrixToHeadPose = (
  matrix: RotationMatrix3,
): HeadPose | null => {
  if (!isProperRotation(matrix)) {
    return null;
  }

  const yaw = Math.asin(-clamp(matrix[2][0], -1, 1));
  const pitch = Math.atan2(matrix[2][1], matrix[2][2]);

  // Gimbal lock: fall back to the first-row terms for roll.
  const roll =
    Math.abs(Math.cos(yaw)) > 1e-6
      ? Math.atan2(matrix[1][0], matrix[0][0])
      : Math.atan2(-matrix[0][1], matrix[1][1]);

  return {
    pitchDeg: toDegrees(pitch),
    yawDeg: toDegrees(yaw),
    rollDeg: toDegrees(roll),
  };
};
