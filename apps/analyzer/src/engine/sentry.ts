import {
  getMonitoringConfig,
  sanitizeSentryEvent,
} from "../shared/config/monitoring";
import { describeError, getLogger, type LoggerProcessType } from "../shared/logger";

type SentryNodeModule = typeof import("@sentry/node");

const logger = getLogger("sentry", "engine");

let sentryModule: Promise<SentryNodeModule | null> | null = null;

let initialised = false;

let handlersRegistered = false;

const loadSentryModule = (): Promise<SentryNodeModule | null> => {
  if (!sentryModule) {
    sentryModule = import("@sentry/node").catch((error: unknown) => {
      logger.warn("Failed to load @sentry/node", describeError(error));
      return null;
    });
  }
  return sentryModule;
};

export const initSentry = async (
  processType: LoggerProcessType = "engine",
): Promise<boolean> => {
  const monitoring = getMonitoringConfig();
  if (!monitoring.sentry.enabled) {
    logger.debug("Sentry disabled by configuration");
    return false;
  }
  if (initialised) {
    return true;
  }

  const sentry = await loadSentryModule();
  if (!sentry) {
    logger.debug("Sentry initialisation skipped: module unavailable");
    return false;
  }

  sentry.init({
    dsn: monitoring.sentry.dsn,
    environment: monitoring.environment,
    release: monitoring.release,
    tracesSampleRate: monitoring.sentry.tracesSampleRate,
    beforeSend: (event) => sanitizeSentryEvent(event),
  });
  sentry.setTag("process", processType);
  sentry.setContext("runtime", {
    pid: process.pid,
    platform: process.platform,
    node: process.versions.node,
  });

  initialised = true;
  return true;
};

export const captureEngineException = async (
  error: unknown,
  context: Record<string, unknown> = {},
): Promise<void> => {
  if (!initialised || !getMonitoringConfig().sentry.enabled) {
    return;
  }

  const sentry = await loadSentryModule();
  if (!sentry) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));
  sentry.captureException(normalisedError, { extra: context });
};

export const flushSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!initialised) {
    return;
  }
  const sentry = await loadSentryModule();
  await sentry?.flush(timeoutMs);
};

const describeRejection = (reason: unknown): Error => {
  if (reason instanceof Error) {
    return reason;
  }
  if (typeof reason === "string") {
    return new Error(reason);
  }
  try {
    return new Error(JSON.stringify(reason));
  } catch {
    return new Error("unknown");
  }
};

export const registerProcessHandlers = (
  processType: LoggerProcessType = "cli",
) => {
  if (handlersRegistered) {
    return;
  }
  handlersRegistered = true;
  const processLogger = getLogger("process", processType);

  process.on("uncaughtException", (error) => {
    processLogger.fatal("Uncaught exception", describeError(error));
    captureEngineException(error).catch(() => undefined);
  });

  process.on("unhandledRejection", (reason) => {
    const error = describeRejection(reason);
    processLogger.fatal("Unhandled rejection", describeError(error));
    captureEngineException(error).catch(() => undefined);
  });
};
