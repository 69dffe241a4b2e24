import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Helpers for resolving and loading locale files from within the workspace.
 * Apps import `@stancecheck/i18n-tools` instead of re-computing paths relative
 * to their own sources.
 */

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const packageRoot = path.resolve(__dirname, "..");
const workspaceRoot = path.resolve(packageRoot, "..", "..");

export const LOCALES_ROOT = path.join(
  workspaceRoot,
  "apps",
  "analyzer",
  "locales",
);

export const DEFAULT_LOCALES = ["en-US", "ko-KR"] as const;

export type LocaleResource = Record<string, unknown>;

export class LocaleFileError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
  ) {
    super(message);
    this.name = "LocaleFileError";
  }
}

export function resolveLocaleFile(
  locale: string,
  namespace: string,
  root: string = LOCALES_ROOT,
): string {
  return path.join(root, locale, `${namespace}.json`);
}

const isLocaleResource = (value: unknown): value is LocaleResource => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export function readLocaleNamespace(
  locale: string,
  namespace: string,
  root: string = LOCALES_ROOT,
): LocaleResource {
  const filePath = resolveLocaleFile(locale, namespace, root);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LocaleFileError(
      `Unable to read locale file ${filePath}: ${reason}`,
      filePath,
    );
  }

  if (!isLocaleResource(parsed)) {
    throw new LocaleFileError(
      `Locale file ${filePath} must contain a JSON object`,
      filePath,
    );
  }
  return parsed;
}

/** Dotted key paths of every string leaf, sorted. */
export function collectKeyPaths(resource: LocaleResource, prefix = ""): string[] {
  const keys: string[] = [];
  for (const [key, value] of Object.entries(resource)) {
    const keyPath = prefix ? `${prefix}.${key}` : key;
    if (isLocaleResource(value)) {
      keys.push(...collectKeyPaths(value, keyPath));
    } else {
      keys.push(keyPath);
    }
  }
  return keys.sort();
}

/** Keys present in `reference` but absent from `candidate`. */
export function findMissingKeys(
  reference: LocaleResource,
  candidate: LocaleResource,
): string[] {
  const candidateKeys = new Set(collectKeyPaths(candidate));
  return collectKeyPaths(reference).filter((key) => !candidateKeys.has(key));
}
