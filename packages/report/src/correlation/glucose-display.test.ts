/**
 * Tests for the glucose column text
 */

import { describe, it, expect } from "vitest";
import { trendArrow, formatDelta, formatCgmValue, formatGlucoseDisplay } from "./glucose-display.js";
import type { GlucoseReading } from "../models/index.js";

function reading(overrides: Partial<GlucoseReading>): GlucoseReading {
  return { timestamp: 0, value: 120, trendDirection: null, delta: null, ...overrides };
}

describe("trendArrow", () => {
  it("maps known directions", () => {
    expect(trendArrow("DoubleUp")).toBe("⇈");
    expect(trendArrow("FortyFiveDown")).toBe("↘");
    expect(trendArrow("Flat")).toBe("→");
    expect(trendArrow("RATE OUT OF RANGE")).toBe("?");
  });

  it("returns empty for unknown or missing directions", () => {
    expect(trendArrow("NONE")).toBe("");
    expect(trendArrow("toString")).toBe("");
    expect(trendArrow(null)).toBe("");
  });
});

describe("formatDelta", () => {
  it("adds a sign to positive values", () => {
    expect(formatDelta(3.4)).toBe("+3");
    expect(formatDelta(-2.6)).toBe("-3");
    expect(formatDelta(0.3)).toBe("0");
    expect(formatDelta(-0.4)).toBe("0");
  });

  it("rounds halves to even", () => {
    expect(formatDelta(2.5)).toBe("+2");
    expect(formatDelta(3.5)).toBe("+4");
    expect(formatDelta(-2.5)).toBe("-2");
    expect(formatDelta(0.5)).toBe("0");
    expect(formatDelta(-0.5)).toBe("0");
  });
});

describe("formatCgmValue", () => {
  it("formats value, delta and arrow", () => {
    expect(formatCgmValue(reading({ delta: 4.2, trendDirection: "FortyFiveUp" }))).toBe(
      "120 (+4) ↗"
    );
  });

  it("omits a zero delta and an unknown arrow", () => {
    expect(formatCgmValue(reading({ delta: 0, trendDirection: "NONE" }))).toBe("120");
  });

  it("rounds a halfway delta to even", () => {
    expect(formatCgmValue(reading({ delta: 2.5 }))).toBe("120 (+2)");
  });

  it("shows a delta that rounds to zero", () => {
    expect(formatCgmValue(reading({ delta: 0.2 }))).toBe("120 (0)");
  });

  it("is empty without a usable value", () => {
    expect(formatCgmValue(reading({ value: null, delta: 3 }))).toBe("");
    expect(formatCgmValue(reading({ value: 0 }))).toBe("");
  });
});

describe("formatGlucoseDisplay", () => {
  it("appends a manual check to the sensor text", () => {
    expect(formatGlucoseDisplay("120 →", "118", "measured")).toBe("120 → / measured:118");
  });

  it("shows only the manual check without sensor text", () => {
    expect(formatGlucoseDisplay("", "95", "実測")).toBe("実測:95");
  });

  it("passes the sensor text through otherwise", () => {
    expect(formatGlucoseDisplay("120", null, "measured")).toBe("120");
    expect(formatGlucoseDisplay("", null, "measured")).toBe("");
  });
});
