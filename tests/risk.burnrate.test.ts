import { ValidationError } from "../src/lib/errors";
import { burnRateSeverity, detectBurnRate, timelineOf } from "../src/risk/burnrate";
import { REFERENCE_DATE, project } from "./fixtures";

const dated = { startDate: "2025-09-01", endDate: "2026-04-30" };

describe("Burn-Rate detector", () => {
  it("rejects a reference date that is not a calendar date", () => {
    const p = project({ name: "Alpha", budget: 200000, actualSpend: 185000, ...dated });
    expect(() => detectBurnRate(p, "garbage")).toThrow(ValidationError);
    expect(() => detectBurnRate(p, "2026-02-30")).toThrow(
      "referenceDate must be a calendar date as YYYY-MM-DD, got '2026-02-30'"
    );
  });

  it("skips projects without a budget", () => {
    expect(detectBurnRate(project({ name: "Alpha", budget: 0, actualSpend: 5000 }), REFERENCE_DATE)).toEqual([]);
    expect(detectBurnRate(project({ name: "Alpha", actualSpend: 5000, ...dated }), REFERENCE_DATE)).toEqual([]);
  });

  it("raises exactly one Critical risk on overspend, with or without dates", () => {
    for (const dates of [{}, dated, { startDate: "2026-01-01", endDate: "2026-01-01" }]) {
      const risks = detectBurnRate(project({ name: "Pier", budget: 100000, actualSpend: 150000, ...dates }), REFERENCE_DATE);
      expect(risks).toHaveLength(1);
      expect(risks[0].severity).toBe("Critical");
      expect(risks[0].title).toBe("Pier has exceeded budget (150% spent)");
      expect(risks[0].explanation).toContain("150,000 of 100,000 budgeted");
      expect(risks[0].suggestedMitigation).toContain("steering committee");
    }
  });

  it("flags 92.5% spend with a quarter of the time left as Critical", () => {
    const p = project({ name: "Alpha", budget: 200000, actualSpend: 185000, ...dated });

    const risks = detectBurnRate(p, REFERENCE_DATE);

    expect(risks).toHaveLength(1);
    expect(risks[0].severity).toBe("Critical");
    expect(risks[0].explanation).toContain("185,000 of 200,000 budgeted");
    expect(risks[0].explanation).toContain("as of 2026-02-19");
  });

  it("flags 90% spend with under 20% of the time left as High", () => {
    // 200 of 241 days elapsed
    const p = project({ name: "Alpha", budget: 200000, actualSpend: 180000, ...dated });
    expect(detectBurnRate(p, "2026-03-20").map((r) => r.severity)).toEqual(["High"]);
  });

  it("stays quiet when almost no time is left", () => {
    const p = project({ name: "Alpha", budget: 200000, actualSpend: 190000, ...dated });
    expect(detectBurnRate(p, "2026-04-20")).toEqual([]);
  });

  it("stays quiet below 90% spend", () => {
    const p = project({ name: "Alpha", budget: 200000, actualSpend: 100000, ...dated });
    expect(detectBurnRate(p, REFERENCE_DATE)).toEqual([]);
  });

  it("raises a High risk when dates are missing and spend is high", () => {
    const p = project({ name: "Cyber Compliance", budget: 80000, actualSpend: 76000 });

    const risks = detectBurnRate(p, REFERENCE_DATE);

    expect(risks).toHaveLength(1);
    expect(risks[0].severity).toBe("High");
    expect(risks[0].title).toBe("Cyber Compliance has used 95% of budget (no timeline data)");
    expect(risks[0].explanation).toContain("dates are unavailable");
  });

  it("ignores missing dates when spend is low", () => {
    expect(detectBurnRate(project({ name: "Beta", budget: 80000, actualSpend: 1000 }), REFERENCE_DATE)).toEqual([]);
  });

  it("treats a zero-length date range as insufficient data", () => {
    const p = project({ name: "Beta", budget: 100, actualSpend: 95, startDate: "2026-01-01", endDate: "2026-01-01" });
    expect(detectBurnRate(p, REFERENCE_DATE)).toEqual([]);
  });
});

describe("burnRateSeverity", () => {
  it("follows the threshold ladder", () => {
    expect(burnRateSeverity(0.96, 0.05)).toBe("Critical");
    expect(burnRateSeverity(0.92, 0.25)).toBe("Critical");
    expect(burnRateSeverity(0.92, 0.2)).toBe("Critical");
    expect(burnRateSeverity(0.92, 0.15)).toBe("High");
  });

  // Only reachable by calling the ladder directly; detectBurnRate needs 90% spend first.
  it("falls back to Medium below the spend threshold", () => {
    expect(burnRateSeverity(0.85, 0.5)).toBe("Medium");
  });
});

describe("timelineOf", () => {
  it("clamps the elapsed share to the project dates", () => {
    const p = project({ name: "Alpha", ...dated });
    expect(timelineOf(p, "2025-01-01")).toEqual({ totalDays: 241, elapsedPct: 0, remainingPct: 1 });
    expect(timelineOf(p, "2027-01-01")).toEqual({ totalDays: 241, elapsedPct: 1, remainingPct: 0 });
    expect(timelineOf(p, REFERENCE_DATE)?.totalDays).toBe(241);
  });
});
