import { readFile } from "node:fs/promises";
import type { ScreenClassification } from "../../shared/types/signals";
import {
  type KeywordLists,
  isKeywordLists,
} from "../../shared/validation/signalPayloads";

const normaliseKeywords = (keywords: readonly string[]): string[] => {
  const unique = new Set<string>();
  keywords.forEach((keyword) => {
    const normalised = keyword.trim().toLowerCase();
    if (normalised.length > 0) {
      unique.add(normalised);
    }
  });
  return [...unique];
};

/**
 * Case-insensitive substring match of a window title against keyword lists.
 * Unproductive keywords are checked first, so a title matching both lists is
 * UNPRODUCTIVE.
 */
export class ScreenClassifier {
  private readonly productive: string[];

  private readonly unproductive: string[];

  constructor(lists: KeywordLists) {
    this.productive = normaliseKeywords(lists.productive);
    this.unproductive = normaliseKeywords(lists.unproductive);
  }

  classify(title: string | null | undefined): ScreenClassification {
    if (typeof title !== "string") {
      return "NEUTRAL";
    }

    const haystack = title.toLowerCase();
    if (haystack.trim().length === 0) {
      return "NEUTRAL";
    }

    if (this.unproductive.some((keyword) => haystack.includes(keyword))) {
      return "UNPRODUCTIVE";
    }

    if (this.productive.some((keyword) => haystack.includes(keyword))) {
      return "PRODUCTIVE";
    }

    return "NEUTRAL";
  }

  getKeywordCounts(): { productive: number; unproductive: number } {
    return {
      productive: this.productive.length,
      unproductive: this.unproductive.length,
    };
  }
}

export const loadKeywordLists = async (filePath: string): Promise<KeywordLists> => {
  const raw = await readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Keyword file ${filePath} is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }

  if (!isKeywordLists(parsed)) {
    throw new Error(
      `Keyword file ${filePath} must contain "productive" and "unproductive" string arrays`,
    );
  }

  return parsed;
};

export const createScreenClassifierFromFile = async (
  filePath: string,
): Promise<ScreenClassifier> => {
  return new ScreenClassifier(await loadKeywordLists(filePath));
};
