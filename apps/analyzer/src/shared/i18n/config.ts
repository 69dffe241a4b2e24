import i18next, { type InitOptions, type i18n } from "i18next";
import { readLocaleNamespace } from "@stancecheck/i18n-tools";
import { describeError, getLogger } from "../logger";

const logger = getLogger("i18n", "engine");

export const DEFAULT_LANGUAGE = "en-US" as const;
export const FALLBACK_LANGUAGE = "en-US" as const;
export const SUPPORTED_LANGUAGES = ["en-US", "ko-KR"] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export const REPORT_NAMESPACE = "report";

export const isSupportedLanguage = (
  language: string,
): language is SupportedLanguage =>
  SUPPORTED_LANGUAGES.some((supported) => supported === language);

let resourcesCache: InitOptions["resources"] | null = null;

const loadResources = (): NonNullable<InitOptions["resources"]> => {
  if (!resourcesCache) {
    const resources: NonNullable<InitOptions["resources"]> = {};
    for (const language of SUPPORTED_LANGUAGES) {
      resources[language] = {
        [REPORT_NAMESPACE]: readLocaleNamespace(language, REPORT_NAMESPACE),
      };
    }
    resourcesCache = resources;
  }
  return resourcesCache;
};

const instances = new Map<SupportedLanguage, i18n>();

/**
 * One isolated i18next instance per language. Resources are bundled from the
 * locale files, so initialisation completes synchronously.
 */
export const getReportI18n = (language: SupportedLanguage): i18n => {
  const cached = instances.get(language);
  if (cached) {
    return cached;
  }

  const instance = i18next.createInstance();
  instance
    .init({
      resources: loadResources(),
      supportedLngs: [...SUPPORTED_LANGUAGES],
      fallbackLng: FALLBACK_LANGUAGE,
      lng: language,
      ns: [REPORT_NAMESPACE],
      defaultNS: REPORT_NAMESPACE,
      keySeparator: ".",
      initImmediate: false,
      interpolation: {
        escapeValue: false,
      },
      returnNull: false,
    })
    .catch((error: unknown) => {
      instances.delete(language);
      logger.error("Failed to initialise report translations", {
        language,
        ...describeError(error),
      });
    });

  instances.set(language, instance);
  return instance;
};

export type ReportTranslator = (
  key: string,
  values?: Record<string, string | number>,
) => string;

export const createReportTranslator = (
  language: SupportedLanguage,
): ReportTranslator => {
  const instance = getReportI18n(language);
  return (key, values) => instance.t(key, { ...values });
};
