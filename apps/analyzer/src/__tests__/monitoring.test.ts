import { describe, expect, it } from "vitest";
import {
  resolveMonitoringConfig,
  sanitizeSentryEvent,
  type SanitizableSentryEvent,
} from "../shared/config/monitoring";

describe("monitoring configuration", () => {
  it("disables Sentry when DSN is absent", () => {
    const config = resolveMonitoringConfig({
      NODE_ENV: "development",
      SENTRY_DSN: "",
    });

    expect(config.sentry.enabled).toBe(false);
    expect(config.logtail.consoleOnly).toBe(true);
  });

  it("enables Sentry and Better Stack in production when tokens are present", () => {
    const config = resolveMonitoringConfig({
      NODE_ENV: "production",
      SENTRY_DSN: "https://public@sentry.example.com/1",
      BETTER_STACK_TOKEN: "test-token",
    });

    expect(config.sentry.enabled).toBe(true);
    expect(config.logtail.enabled).toBe(true);
    expect(config.environment).toBe("production");
  });

  it("keeps Sentry off in development unless explicitly enabled", () => {
    const env = {
      NODE_ENV: "development",
      SENTRY_DSN: "https://public@sentry.example.com/1",
    };

    expect(resolveMonitoringConfig(env).sentry.enabled).toBe(false);
    expect(
      resolveMonitoringConfig({ ...env, ENABLE_SENTRY_IN_DEV: "true" }).sentry
        .enabled,
    ).toBe(true);
  });

  it("prefers STANCECHECK_ENV over NODE_ENV", () => {
    const config = resolveMonitoringConfig({
      NODE_ENV: "production",
      STANCECHECK_ENV: "staging",
    });

    expect(config.environment).toBe("staging");
  });

  it("falls back to the default sample rate on garbage input", () => {
    const config = resolveMonitoringConfig({ SENTRY_TRACES_SAMPLE_RATE: "lots" });

    expect(config.sentry.tracesSampleRate).toBe(0.1);
  });

  it("sanitises sensitive fields before sending", () => {
    const event: SanitizableSentryEvent = {
      user: {
        id: "user-123",
        email: "person@example.com",
      },
      extra: {
        password: "test-secret",
        nested: {
          token: "test-token",
        },
        inputPath: "/home/someone/squat.json",
        frames: 120,
      },
      breadcrumbs: [
        {
          category: "cli",
          data: { authorization: "Bearer test-secret", step: "parse" },
        },
      ],
      request: { url: "http://localhost" },
    };

    const sanitized = sanitizeSentryEvent(event);

    expect(sanitized.user).toEqual({ id: "user-123" });
    expect(sanitized.extra).toEqual({
      password: "[redacted]",
      nested: { token: "[redacted]" },
      inputPath: "[redacted]",
      frames: 120,
    });
    expect(sanitized.breadcrumbs).toEqual([
      {
        category: "cli",
        data: { authorization: "[redacted]", step: "parse" },
      },
    ]);
    expect(sanitized.request).toBeUndefined();
  });
});
