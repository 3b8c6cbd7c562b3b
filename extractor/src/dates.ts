import { Temporal } from "@js-temporal/polyfill";
import { UsageError } from "./errors.ts";

export type DateSeparator = "_" | "-";

/**
 * Parses a `YYYYMMDD` command line argument.
 */
export function parseDateArgument(text: string): Temporal.PlainDate {
  const match = /^([0-9]{4})([0-9]{2})([0-9]{2})$/.exec(text);
  if (!match) {
    throw new UsageError("Improper date format: Use YYYYMMDD");
  }

  try {
    return Temporal.PlainDate.from(
      {
        year: Number(match[1]),
        month: Number(match[2]),
        day: Number(match[3]),
      },
      { overflow: "reject" },
    );
  } catch (e) {
    throw new UsageError(`Not a calendar date: ${text}`, { cause: e });
  }
}

/**
 * `2015_02_03` for addresses and data rows, `2015-02-03` for reports.
 */
export function formatDateKey(
  date: Temporal.PlainDate,
  separator: DateSeparator,
): string {
  return date.toString().replaceAll("-", separator);
}

/**
 * Parses the `YYYY_MM_DD` form used in data rows.
 */
export function parseDateKey(text: string): Temporal.PlainDate | undefined {
  const match = /^([0-9]{4})_([0-9]{2})_([0-9]{2})$/.exec(text);
  if (!match) return undefined;
  try {
    return Temporal.PlainDate.from(
      {
        year: Number(match[1]),
        month: Number(match[2]),
        day: Number(match[3]),
      },
      { overflow: "reject" },
    );
  } catch {
    return undefined;
  }
}

export function parseTimeOfDay(text: string): Temporal.PlainTime | undefined {
  if (!/^[0-9]{2}:[0-9]{2}:[0-9]{2}$/.test(text)) return undefined;
  try {
    return Temporal.PlainTime.from(text, { overflow: "reject" });
  } catch {
    return undefined;
  }
}
