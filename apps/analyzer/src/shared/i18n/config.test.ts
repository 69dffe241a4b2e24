import { describe, expect, it } from "vitest";
import {
  createReportTranslator,
  getReportI18n,
  isSupportedLanguage,
} from "./config";

describe("report translations", () => {
  it("recognises supported languages", () => {
    expect(isSupportedLanguage("en-US")).toBe(true);
    expect(isSupportedLanguage("ko-KR")).toBe(true);
    expect(isSupportedLanguage("de-DE")).toBe(false);
  });

  it("interpolates side and angle", () => {
    const translate = createReportTranslator("en-US");

    expect(
      translate("severity.attention.message", {
        sideText: translate("side.right"),
        angle: 42,
      }),
    ).toBe(
      "Mild compensation: load shifts away from the right leg around 42° knee flexion.",
    );
  });

  it("keeps one isolated instance per language", () => {
    expect(getReportI18n("ko-KR")).toBe(getReportI18n("ko-KR"));
    expect(getReportI18n("ko-KR").language).toBe("ko-KR");
    expect(getReportI18n("en-US").language).toBe("en-US");
    expect(createReportTranslator("ko-KR")("cli.severity")).toBe("심각도");
  });
});
