import i18next, { type InitOptions, type i18n } from "i18next";
import commonEn from "../../../locales/en-US/common.json";
import commonKo from "../../../locales/ko-KR/common.json";
import type { RuntimeEnv } from "../env";
import { getLogger, toErrorPayload } from "../logger";

export const DEFAULT_LANGUAGE = "en-US" as const;
export const SUPPORTED_LANGUAGES = [DEFAULT_LANGUAGE, "ko-KR"] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

const resources = {
  "en-US": {
    common: commonEn,
  },
  "ko-KR": {
    common: commonKo,
  },
} as const;

const logger = getLogger("i18n", "main");

const initOptions: InitOptions = {
  resources,
  supportedLngs: [...SUPPORTED_LANGUAGES],
  fallbackLng: DEFAULT_LANGUAGE,
  ns: ["common"],
  defaultNS: "common",
  keySeparator: ".",
  interpolation: {
    escapeValue: false,
  },
  returnNull: false,
  // Resources are bundled, so initialisation completes synchronously.
  initImmediate: false,
};

export const isSupportedLanguage = (
  language: string,
): language is SupportedLanguage =>
  SUPPORTED_LANGUAGES.some((supported) => supported === language);

/**
 * Maps a POSIX locale such as `ko_KR.UTF-8` to a supported language tag.
 */
export const resolveLanguage = (env: RuntimeEnv = process.env): SupportedLanguage => {
  const candidates = [env.WORKTALLY_LANG, env.LC_ALL, env.LC_MESSAGES, env.LANG];

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const tag = candidate.split(".")[0]?.replace("_", "-") ?? "";
    if (isSupportedLanguage(tag)) {
      return tag;
    }
    const prefix = tag.split("-")[0]?.toLowerCase();
    const byPrefix = SUPPORTED_LANGUAGES.find((language) =>
      language.toLowerCase().startsWith(`${prefix}-`),
    );
    if (byPrefix) {
      return byPrefix;
    }
  }

  return DEFAULT_LANGUAGE;
};

let instance: i18n | null = null;

export const initializeI18n = (language: SupportedLanguage = resolveLanguage()): i18n => {
  if (instance) {
    if (instance.language !== language) {
      instance.changeLanguage(language).catch((error: unknown) => {
        logger.warn("Failed to switch language", {
          ...toErrorPayload(error),
          language,
        });
      });
    }
    return instance;
  }

  const created = i18next.createInstance();
  created.init({ ...initOptions, lng: language }).catch((error: unknown) => {
    logger.error("Failed to initialise translations", toErrorPayload(error));
  });
  instance = created;
  return created;
};

export const getI18n = (): i18n => instance ?? initializeI18n();

export type Translate = (key: string, options?: Record<string, unknown>) => string;

export const translate: Translate = (key, options) => {
  return String(getI18n().t(key, options));
};
