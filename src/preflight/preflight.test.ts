import { describe, expect, it } from "vitest";

import { baseSettings, createTestLogger } from "../app/pipeline/__tests__/fakes.js";

import { checkPreflight, missingSettings } from "./preflight.js";

describe("checkPreflight", () => {
  it("passes when both mandatory values are present", () => {
    const { logger, sink } = createTestLogger();

    expect(checkPreflight(baseSettings(), logger)).toBe(true);
    expect(sink.events().filter((event) => event.level === "warn")).toEqual([]);
  });

  it("warns once per missing value and fails in aggregate", () => {
    const { logger, sink } = createTestLogger();

    const ok = checkPreflight(baseSettings({ databaseUrl: null, adminPassword: null }), logger);

    expect(ok).toBe(false);
    expect(
      sink
        .events()
        .filter((event) => event.level === "warn")
        .map((event) => event.payload),
    ).toEqual([{ setting: "DATABASE_URL" }, { setting: "ADMIN_PASSWORD" }]);
  });

  it("fails on a single missing value", () => {
    const { logger } = createTestLogger();

    expect(checkPreflight(baseSettings({ adminPassword: null }), logger)).toBe(false);
  });
});

describe("missingSettings", () => {
  it("names the missing values in check order", () => {
    expect(missingSettings(baseSettings({ databaseUrl: null, adminPassword: null }))).toEqual([
      "DATABASE_URL",
      "ADMIN_PASSWORD",
    ]);
    expect(missingSettings(baseSettings())).toEqual([]);
  });
});
