export type ScreenClassification = "PRODUCTIVE" | "UNPRODUCTIVE" | "NEUTRAL";

export const SCREEN_CLASSIFICATIONS = [
  "PRODUCTIVE",
  "UNPRODUCTIVE",
  "NEUTRAL",
] as const satisfies readonly ScreenClassification[];

export type ScreenReading = {
  classification: ScreenClassification;
  windowTitle: string | null;
  appName: string | null;
};

export type SignalSnapshot = ScreenReading & {
  activity: boolean;
  focused: boolean;
};

export type RotationMatrix3 = [
  [number, number, number],
  [number, number, number],
  [number, number, number],
];

/**
 * One observation pushed by the capture client. Angles are in degrees; when a
 * rotation matrix is supplied instead, it is converted on arrival.
 */
export type PresenceSample = {
  timestamp: number;
  faceDetected: boolean;
  yawDeg: number | null;
  pitchDeg: number | null;
};

export type PresenceSampleInput = {
  timestamp?: number;
  faceDetected: boolean;
  yawDeg?: number | null;
  pitchDeg?: number | null;
  rotationMatrix?: RotationMatrix3 | null;
};

export type ActivityPing = {
  timestamp?: number;
  source?: "keyboard" | "mouse" | "other";
};
