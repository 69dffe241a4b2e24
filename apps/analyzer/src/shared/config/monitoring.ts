import { parseBooleanFlag } from "../env";

type Environment = string;
type RuntimeEnv = Record<string, string | undefined>;

export type SanitizableSentryEvent = Record<string, unknown>;

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.STANCECHECK_ENV ?? env.APP_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV ?? "development";
  if (nodeEnv && nodeEnv.trim().length > 0) {
    return nodeEnv;
  }

  return "development";
};

// Keypoint payloads carry no identity, but file paths and free-form
// metadata can. Anything matching these keys is dropped before sending.
const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "email",
  "phone",
  "patient",
  "path",
];

const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (isPlainRecord(value)) {
    const result: Record<string, unknown> = {};

    Object.entries(value).forEach(([key, nestedValue]) => {
      const lowerKey = key.toLowerCase();
      if (
        SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))
      ) {
        result[key] = "[redacted]";
        return;
      }

      result[key] = scrubValue(nestedValue);
    });

    return result;
  }

  if (typeof value === "string") {
    if (
      SENSITIVE_KEYS.some((sensitiveKey) =>
        value.toLowerCase().includes(sensitiveKey),
      )
    ) {
      return "[redacted]";
    }
  }

  return value;
};

export const sanitizeSentryEvent = <TEvent>(event: TEvent): TEvent => {
  if (!isPlainRecord(event)) {
    return event;
  }

  const record: Record<string, unknown> = event;

  const rawBreadcrumbs = record.breadcrumbs;
  if (Array.isArray(rawBreadcrumbs)) {
    record.breadcrumbs = rawBreadcrumbs
      .filter((breadcrumb): breadcrumb is Record<string, unknown> => {
        return isPlainRecord(breadcrumb);
      })
      .map((breadcrumb) => {
        const breadcrumbRecord = { ...breadcrumb };
        if ("data" in breadcrumbRecord) {
          breadcrumbRecord.data = scrubValue(breadcrumbRecord.data);
        }
        return breadcrumbRecord;
      });
  }

  record.request = undefined;

  if (isPlainRecord(record.extra)) {
    record.extra = scrubValue(record.extra);
  }

  if (isPlainRecord(record.contexts)) {
    record.contexts = scrubValue(record.contexts);
  }

  // Only an opaque id survives; usernames and addresses are dropped.
  if (isPlainRecord(record.user)) {
    const userId = record.user.id;
    record.user =
      typeof userId === "string" || typeof userId === "number"
        ? { id: String(userId) }
        : undefined;
  }

  return event;
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    enableInDevelopment: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
    consoleOnly: boolean;
  };
};

export const resolveMonitoringConfig = (
  runtimeEnv: RuntimeEnv = process.env,
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? "";
  const enableSentryInDev = parseBooleanFlag(
    runtimeEnv.ENABLE_SENTRY_IN_DEV,
    false,
  );
  const sentryEnabled =
    Boolean(sentryDsn) && (isProductionLike || enableSentryInDev);

  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? "";
  const logtailEnabled =
    Boolean(logtailToken) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV, false));

  const parsedSampleRate = Number.parseFloat(
    runtimeEnv.SENTRY_TRACES_SAMPLE_RATE ?? "0.1",
  );

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled: sentryEnabled,
      enableInDevelopment: enableSentryInDev,
      tracesSampleRate: Number.isNaN(parsedSampleRate) ? 0.1 : parsedSampleRate,
    },
    logtail: {
      token: logtailToken,
      enabled: logtailEnabled,
      consoleOnly: !logtailEnabled,
    },
  };
};

let currentConfig: MonitoringConfig = resolveMonitoringConfig();

export const getMonitoringConfig = (): MonitoringConfig => currentConfig;

/** Re-reads the environment, e.g. after a `.env` file has been loaded. */
export const reloadMonitoringConfig = (
  runtimeEnv: RuntimeEnv = process.env,
): MonitoringConfig => {
  currentConfig = resolveMonitoringConfig(runtimeEnv);
  return currentConfig;
};
