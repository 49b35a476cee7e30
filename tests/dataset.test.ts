import { buildDataset } from "../src/fetchers/dataset";
import { ConfigurationError } from "../src/utils/errors";

const rows = (entries: Array<[string, number]>) => entries.map(([date, value]) => ({ date, value }));

describe("buildDataset", () => {
  it("keeps only the dates present in all three series, in order", () => {
    const ds = buildDataset({
      spy: rows([["2024-01-05", 104], ["2024-01-02", 100], ["2024-01-03", 101], ["2024-01-04", 103]]),
      vix: rows([["2024-01-02", 14], ["2024-01-04", 16], ["2024-01-05", 18]]),
      fearGreed: rows([["2024-01-02", 60], ["2024-01-03", 55], ["2024-01-04", 50], ["2024-01-05", 45], ["2024-01-06", 40]]),
    });

    expect(ds.prices).toEqual([
      { date: "2024-01-02", close: 100 },
      { date: "2024-01-04", close: 103 },
      { date: "2024-01-05", close: 104 },
    ]);
    expect(ds.sentiment).toEqual([
      { date: "2024-01-02", vix: 14, fearGreed: 60 },
      { date: "2024-01-04", vix: 16, fearGreed: 50 },
      { date: "2024-01-05", vix: 18, fearGreed: 45 },
    ]);
    expect(ds.warnings).toEqual([]);
  });

  it("warns about gaps longer than five calendar days", () => {
    const ds = buildDataset({
      spy: rows([["2024-01-02", 100], ["2024-01-10", 101]]),
      vix: rows([["2024-01-02", 20], ["2024-01-10", 21]]),
      fearGreed: rows([["2024-01-02", 50], ["2024-01-10", 51]]),
    });
    expect(ds.warnings).toEqual([{ date: "2024-01-10", field: "date", message: "8-day gap since 2024-01-02" }]);
  });

  it("keeps a missing reading and records a warning", () => {
    const ds = buildDataset({
      spy: rows([["2024-01-02", 100]]),
      vix: rows([["2024-01-02", NaN]]),
      fearGreed: rows([["2024-01-02", 50]]),
    });
    expect(ds.sentiment[0].vix).toBeNaN();
    expect(ds.warnings).toEqual([{ date: "2024-01-02", field: "vix", message: "missing value" }]);
  });

  it("rejects a negative VIX", () => {
    expect(() =>
      buildDataset({
        spy: rows([["2024-01-02", 100]]),
        vix: rows([["2024-01-02", -1]]),
        fearGreed: rows([["2024-01-02", 50]]),
      }),
    ).toThrow(ConfigurationError);
  });

  it("rejects a zero VIX", () => {
    expect(() =>
      buildDataset({
        spy: rows([["2024-01-02", 100]]),
        vix: rows([["2024-01-02", 0]]),
        fearGreed: rows([["2024-01-02", 50]]),
      }),
    ).toThrow("Invalid VIX on 2024-01-02: 0");
  });

  it("rejects a Fear & Greed score above 100", () => {
    expect(() =>
      buildDataset({
        spy: rows([["2024-01-02", 100]]),
        vix: rows([["2024-01-02", 20]]),
        fearGreed: rows([["2024-01-02", 101]]),
      }),
    ).toThrow("Fear & Greed out of range (0-100) on 2024-01-02: 101");
  });

  it("fails when nothing overlaps", () => {
    expect(() =>
      buildDataset({
        spy: rows([["2024-01-02", 100]]),
        vix: rows([["2024-01-03", 20]]),
        fearGreed: rows([["2024-01-02", 50]]),
      }),
    ).toThrow(/No overlapping dates/);
  });
});
