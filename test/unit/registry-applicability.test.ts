import { describe, expect, it } from "vitest";
import { assessApplicability, toIsoDay } from "../../src/modules/registry/applicability.js";

const NOW = new Date("2025-03-01T12:00:00Z");

describe("assessApplicability", () => {
  it("accepts an open-ended window that has started", () => {
    expect(assessApplicability("2008-01-01", null, NOW)).toEqual({
      isApplicable: true,
      status: "currently_applicable",
      details: "Applicable since 2008-01-01"
    });
  });

  it("treats the start and end days as inclusive", () => {
    expect(assessApplicability("2025-03-01", "2025-03-01", NOW)).toEqual({
      isApplicable: true,
      status: "currently_applicable",
      details: "Applicable from 2025-03-01 to 2025-03-01"
    });
  });

  it("excludes a window that ended in the past", () => {
    expect(assessApplicability("2006-01-01", "2007-12-31", NOW)).toEqual({
      isApplicable: false,
      status: "expired",
      details: "Was applicable from 2006-01-01 to 2007-12-31"
    });
  });

  it("excludes records that only become applicable later", () => {
    expect(assessApplicability("2026-01-01", undefined, NOW).status).toBe("not_yet_applicable");
    expect(assessApplicability("2026-01-01", "2027-01-01", NOW).details).toBe(
      "Will be applicable from 2026-01-01 to 2027-01-01"
    );
  });

  it("never accepts a record without a start date", () => {
    expect(assessApplicability(null, null, NOW)).toEqual({
      isApplicable: false,
      status: "no_dates_available",
      details: "Applicability dates not specified"
    });
    expect(assessApplicability("  ", "2030-01-01", NOW).details).toBe("Applicability start date not specified");
  });

  it("reports unparseable dates", () => {
    expect(assessApplicability("01.01.2008", null, NOW)).toEqual({
      isApplicable: false,
      status: "invalid_dates",
      details: "Unparseable applicability dates (01.01.2008 / -)"
    });
  });

  it("reads only the day part of date-time values", () => {
    expect(assessApplicability("2025-03-01T23:00:00+01:00", null, NOW).isApplicable).toBe(true);
    expect(toIsoDay(NOW)).toBe("2025-03-01");
  });
});
