import { getLogger, toErrorPayload } from "../../shared/logger";
import type { ScreenReading } from "../../shared/types/signals";
import type { ScreenClassifier } from "../classification/screen-classifier";
import type { ScreenSource } from "./types";

export type ActiveWindowInfo = {
  title: string | null;
  appName: string | null;
};

export type ActiveWindowReader = () => Promise<ActiveWindowInfo | null>;

const logger = getLogger("window-title-source", "monitor");

let activeWinModule: Promise<{ default: typeof import("active-win") }> | null = null;

// active-win ships as ESM with a native helper per platform, so it is loaded on first use.
export const readActiveWindow: ActiveWindowReader = async () => {
  if (!activeWinModule) {
    activeWinModule = import("active-win");
  }
  const { default: activeWindow } = await activeWinModule;
  const result = await activeWindow();
  if (!result) {
    return null;
  }
  return {
    title: result.title || null,
    appName: result.owner.name || null,
  };
};

/**
 * Reads the foreground window and classifies its title. Any failure to read
 * the window degrades to NEUTRAL instead of failing the tick.
 */
export class WindowTitleSource implements ScreenSource {
  private readonly classifier: ScreenClassifier;

  private readonly reader: ActiveWindowReader;

  private failureLogged = false;

  constructor(classifier: ScreenClassifier, reader: ActiveWindowReader = readActiveWindow) {
    this.classifier = classifier;
    this.reader = reader;
  }

  async readScreen(): Promise<ScreenReading> {
    let window: ActiveWindowInfo | null;
    try {
      window = await this.reader();
      this.failureLogged = false;
    } catch (error) {
      if (!this.failureLogged) {
        logger.warn("Unable to read the active window", toErrorPayload(error));
        this.failureLogged = true;
      }
      window = null;
    }

    const windowTitle = window?.title ?? null;
    return {
      classification: this.classifier.classify(windowTitle),
      windowTitle,
      appName: window?.appName ?? null,
    };
  }
}
