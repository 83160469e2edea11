import type { Applicability } from "./types.js";

const ISO_DAY_REGEX = /^(\d{4}-\d{2}-\d{2})/;

type ParsedDay = { kind: "missing" } | { kind: "invalid" } | { kind: "day"; value: string };

const parseDay = (value: string | null | undefined): ParsedDay => {
  const trimmed = value?.trim() ?? "";
  if (!trimmed) {
    return { kind: "missing" };
  }
  const match = ISO_DAY_REGEX.exec(trimmed);
  if (!match?.[1] || Number.isNaN(Date.parse(match[1]))) {
    return { kind: "invalid" };
  }
  return { kind: "day", value: match[1] };
};

export const toIsoDay = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Day-granular applicability check: start <= today <= end, the end date being
 * the last day the law applies. Records without a start date never qualify.
 */
export const assessApplicability = (
  start: string | null | undefined,
  end: string | null | undefined,
  now: Date
): Applicability => {
  const startDay = parseDay(start);
  const endDay = parseDay(end);
  const today = toIsoDay(now);

  if (startDay.kind === "invalid" || endDay.kind === "invalid") {
    return {
      isApplicable: false,
      status: "invalid_dates",
      details: `Unparseable applicability dates (${start ?? "-"} / ${end ?? "-"})`
    };
  }

  if (startDay.kind === "missing") {
    return {
      isApplicable: false,
      status: "no_dates_available",
      details:
        endDay.kind === "missing"
          ? "Applicability dates not specified"
          : "Applicability start date not specified"
    };
  }

  if (endDay.kind === "missing") {
    return today >= startDay.value
      ? { isApplicable: true, status: "currently_applicable", details: `Applicable since ${startDay.value}` }
      : { isApplicable: false, status: "not_yet_applicable", details: `Will be applicable from ${startDay.value}` };
  }

  const range = `${startDay.value} to ${endDay.value}`;
  if (today < startDay.value) {
    return { isApplicable: false, status: "not_yet_applicable", details: `Will be applicable from ${range}` };
  }
  if (today > endDay.value) {
    return { isApplicable: false, status: "expired", details: `Was applicable from ${range}` };
  }
  return { isApplicable: true, status: "currently_applicable", details: `Applicable from ${range}` };
};
