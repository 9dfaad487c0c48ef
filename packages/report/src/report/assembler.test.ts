/**
 * Tests for daily report assembly
 *
 * The fixture covers one local day (+09:00) with readings and treatments
 * given out of order, a reading and a treatment with bad timestamps, a
 * basal injection, a glucose tablet, an auto-detected snack and a meal.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { assembleReport, buildDailyReport, buildChartSeries, sortByTimestamp } from "./assembler.js";
import type { NightscoutEntry, NightscoutTreatment } from "../parsers/index.js";
import type { GlucoseReading, TreatmentEvent } from "../models/index.js";

const entries: NightscoutEntry[] = [
  { dateString: "2024-04-30T23:00:00.000Z", sgv: 110, direction: "Flat", delta: 1 },
  { dateString: "2024-04-30T22:55:00.000Z", sgv: 105, direction: "FortyFiveUp", delta: 5.4 },
  { dateString: "2024-05-01T03:05:00.000Z", sgv: 180, direction: "SingleUp", delta: 12 },
  { dateString: "bad", sgv: 999 },
  { dateString: "2024-05-01T10:00:00.000Z" },
];

const treatments: NightscoutTreatment[] = [
  {
    created_at: "2024-05-01T03:00:00Z",
    notes: "cir 300 4.5N\nrice\nmiso soup",
    carbs: 60,
    insulin: "4.5",
  },
  { created_at: "2024-04-30T23:02:00Z", notes: "Tore 8", insulin: "8", glucose: "98" },
  { created_at: "2024-05-01T06:00:00Z", notes: "B", carbs: "2" },
  { created_at: "2024-05-01T10:10:00Z", notes: "", carbs: "1.5", insulin: "0.5" },
  { created_at: "oops", carbs: "100", insulin: "10" },
];

describe("buildDailyReport", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds the chart series in local time", () => {
    const report = buildDailyReport(entries, treatments);
    expect(report.chart_times).toEqual(["07:55", "08:00", "12:05"]);
    expect(report.chart_bgs).toEqual([105, 110, 180]);
  });

  it("builds one row per treatment in time order", () => {
    const report = buildDailyReport(entries, treatments);

    expect(report.table_data).toEqual([
      {
        time: "08:02",
        bg: "110 (+1) → / measured:98",
        cir: "-",
        carbs: "-",
        predicted: "-",
        actual: "8",
        type: "-",
        food: "basal insulin",
      },
      {
        time: "12:00",
        bg: "180 (+12) ↑",
        cir: 300,
        carbs: "60g",
        predicted: 4.5,
        actual: "4.5",
        type: "N",
        food: "rice, miso soup",
      },
      {
        time: "15:00",
        bg: "-",
        cir: "-",
        carbs: "2g",
        predicted: "-",
        actual: "-",
        type: "-",
        food: "glucose snack",
      },
      {
        time: "19:10",
        bg: "-",
        cir: "-",
        carbs: "1.5g",
        predicted: "-",
        actual: "0.5",
        type: "-",
        food: "snack",
      },
    ]);
  });

  it("computes the day's statistics", () => {
    const report = buildDailyReport(entries, treatments);

    expect(report.avg_bg).toBe(132);
    expect(report.total_insulin).toBe(5);
    expect(report.basal_insulin).toBe(8);
    expect(report.total_carbs).toBe(63.5);
    expect(report.tcir).toBe("12.7");
  });

  it("reports skipped records", () => {
    buildDailyReport(entries, treatments);
    expect(console.warn).toHaveBeenCalledWith("Skipped 1 entries with an unparseable dateString");
    expect(console.warn).toHaveBeenCalledWith("Skipped 1 treatments with an unparseable created_at");
  });

  it("renders labels in Japanese", () => {
    const report = buildDailyReport(entries, treatments, { labels: "ja" });
    expect(report.table_data[0].bg).toBe("110 (+1) → / 実測:98");
    expect(report.table_data[0].food).toBe("基礎インスリン");
    expect(report.table_data[3].food).toBe("補食");
    expect(report.basal_insulin).toBe(8);
  });

  it("produces identical output for identical input", () => {
    const first = JSON.stringify(buildDailyReport(entries, treatments));
    const second = JSON.stringify(buildDailyReport(entries, treatments));
    expect(second).toBe(first);
  });

  it("leaves entries with a bad dateString out of the average", () => {
    const report = buildDailyReport(
      [
        { dateString: "2024-05-01T03:00:00Z", sgv: 100 },
        { dateString: "yesterday", sgv: 200 },
      ],
      []
    );
    expect(report.avg_bg).toBe(100);
    expect(report.chart_bgs).toEqual([100]);
  });

  it("rounds halfway values to even", () => {
    const report = buildDailyReport(
      [
        { dateString: "2024-05-01T03:00:00Z", sgv: 100, delta: 2.5 },
        { dateString: "2024-05-01T03:05:00Z", sgv: 101 },
      ],
      [{ created_at: "2024-05-01T03:01:00Z", carbs: "29", insulin: "4" }]
    );

    expect(report.avg_bg).toBe(100);
    expect(report.table_data[0].bg).toBe("100 (+2)");
    expect(report.tcir).toBe("7.2");

    const pumpDay = buildDailyReport([], [{ created_at: "2024-05-01T03:00:00Z", insulin: "1.125" }]);
    expect(pumpDay.total_insulin).toBe(1.12);
  });

  it("treats numeric zero fields as absent", () => {
    const report = buildDailyReport(
      [],
      [{ created_at: "2024-05-01T03:00:00Z", carbs: 0, insulin: 0, glucose: 0 }]
    );

    expect(report.table_data[0]).toMatchObject({ bg: "-", carbs: "-", actual: "-" });
    expect(report.total_carbs).toBe(0);
    expect(report.tcir).toBe("-");
  });

  it("counts a zero basal amount from the insulin field", () => {
    const report = buildDailyReport(
      [],
      [{ created_at: "2024-05-01T03:00:00Z", notes: "Tore 0", insulin: "6" }]
    );

    expect(report.basal_insulin).toBe(0);
    expect(report.total_insulin).toBe(6);
    expect(report.table_data[0].food).toBe("basal insulin");
  });

  it("returns an empty report for an empty day", () => {
    expect(buildDailyReport([], [])).toEqual({
      chart_times: [],
      chart_bgs: [],
      table_data: [],
      avg_bg: 0,
      total_insulin: 0,
      basal_insulin: 0,
      total_carbs: 0,
      tcir: "-",
    });
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe("assembleReport", () => {
  const T = Date.UTC(2024, 4, 1, 3, 0);

  function reading(offsetSeconds: number, value: number): GlucoseReading {
    return { timestamp: T + offsetSeconds * 1000, value, trendDirection: null, delta: null };
  }

  function treatment(overrides: Partial<TreatmentEvent>): TreatmentEvent {
    return {
      timestamp: T,
      rawNotes: null,
      carbsText: null,
      insulinText: null,
      measuredGlucoseText: null,
      ...overrides,
    };
  }

  it("matches the closer reading within the window", () => {
    const report = assembleReport(
      [reading(1000, 140), reading(-400, 120)],
      [treatment({})]
    );
    expect(report.table_data[0].bg).toBe("120");
  });

  it("shows no sensor value outside the window", () => {
    const report = assembleReport([reading(1000, 140)], [treatment({})]);
    expect(report.table_data[0].bg).toBe("-");
  });

  it("uses a custom match window and offset", () => {
    const report = assembleReport([reading(1000, 140)], [treatment({})], {
      matchWindowSeconds: 1200,
      utcOffsetMinutes: 0,
    });
    expect(report.table_data[0]).toMatchObject({ time: "03:00", bg: "140" });
  });

  it("skips a row that fails and leaves it out of the totals", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const broken: TreatmentEvent = {
      timestamp: T,
      get rawNotes(): string {
        throw new Error("corrupt note");
      },
      carbsText: "50",
      insulinText: "5",
      measuredGlucoseText: null,
    };

    const report = assembleReport(
      [],
      [broken, treatment({ timestamp: T + 60_000, carbsText: "30", insulinText: "3" })]
    );

    expect(report.table_data).toHaveLength(1);
    expect(report.table_data[0].time).toBe("12:01");
    expect(report.total_carbs).toBe(30);
    expect(report.total_insulin).toBe(3);
    expect(report.tcir).toBe("10.0");
    expect(errorSpy).toHaveBeenCalledTimes(1);

    errorSpy.mockRestore();
  });

  it("rejects invalid options", () => {
    expect(() => assembleReport([], [], { matchWindowSeconds: 0 })).toThrow(
      "Invalid match window: 0 seconds"
    );
  });
});

describe("sortByTimestamp", () => {
  it("keeps input order for equal timestamps", () => {
    const records = [
      { timestamp: 2, id: "a" },
      { timestamp: 1, id: "b" },
      { timestamp: 2, id: "c" },
      { timestamp: 1, id: "d" },
    ];
    expect(sortByTimestamp(records).map((r) => r.id)).toEqual(["b", "d", "a", "c"]);
    expect(records[0].id).toBe("a");
  });
});

describe("buildChartSeries", () => {
  it("skips readings without a value", () => {
    const readings: GlucoseReading[] = [
      { timestamp: Date.UTC(2024, 4, 1, 0, 0), value: 100, trendDirection: null, delta: null },
      { timestamp: Date.UTC(2024, 4, 1, 0, 5), value: null, trendDirection: null, delta: null },
    ];
    expect(buildChartSeries(readings, 540)).toEqual({ times: ["09:00"], values: [100] });
  });
});
