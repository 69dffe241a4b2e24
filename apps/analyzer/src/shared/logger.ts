/* eslint-disable no-console */
// Console output mirrors the structured logs locally; Better Stack receives the same payload when configured.
import { getMonitoringConfig } from "./config/monitoring";

export type LoggerProcessType = "engine" | "extraction" | "cli";

export type LoggerMetadata = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
};

type LogtailAdapter = {
  log: (message: string, metadata: LoggerMetadata) => Promise<void>;
  flush: () => Promise<void>;
};

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const resolveMinimumLevel = (): LogLevel => {
  const raw = process.env.STANCECHECK_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return process.env.NODE_ENV === "test" ? "warn" : "info";
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

const loadLogtail = async (): Promise<LogtailAdapter | null> => {
  const config = getMonitoringConfig();
  if (!config.logtail.enabled) {
    return null;
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      const client = new Logtail(config.logtail.token);
      return {
        log: async (message: string, metadata: LoggerMetadata) => {
          await client.log(message, undefined, metadata);
        },
        flush: async () => {
          await client.flush();
        },
      } satisfies LogtailAdapter;
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const formatConsolePayload = (
  level: LogLevel,
  message: string,
  metadata?: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [
    `[${timestamp}] [${level.toUpperCase()}] ${message}`,
    metadata ?? {},
  ] as const;
};

const emitLogtail = async (message: string, metadata: LoggerMetadata) => {
  try {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }

    await instance.log(message, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, processType }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveMinimumLevel()]) {
      return;
    }

    const monitoring = getMonitoringConfig();
    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoring.environment,
      timestamp: new Date().toISOString(),
      level,
    };

    const [consoleMessage, consoleMetadata] = formatConsolePayload(
      level,
      message,
      enrichedMetadata,
    );

    consoleWriters[level](consoleMessage, consoleMetadata);

    if (monitoring.logtail.enabled) {
      emitLogtail(message, enrichedMetadata).catch(() => undefined);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const debug = createEmitter(options, "debug");
  const info = createEmitter(options, "info");
  const warn = createEmitter(options, "warn");
  const error = createEmitter(options, "error");
  const fatal = createEmitter(options, "fatal");

  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush();
  };

  return {
    debug,
    info,
    warn,
    error,
    fatal,
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType,
): Logger => {
  const cacheKey = `${processType}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};

export const describeError = (error: unknown): LoggerMetadata => {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
};
