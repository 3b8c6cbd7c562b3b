import type { Temporal } from "@js-temporal/polyfill";
import { formatDateKey, parseDateKey, parseTimeOfDay } from "./dates.ts";
import { MalformedDataError } from "./errors.ts";

/**
 * One aligned sample: a timestamp and the three sensor values taken at it.
 */
export interface SensorRecord {
  readonly date: Temporal.PlainDate;
  readonly time: Temporal.PlainTime;
  readonly temperature: number;
  readonly pressure: number;
  readonly windSpeed: number;
  /** The values as written in the source, passed through when rows are printed. */
  readonly text: RecordText;
}

export interface RecordText {
  readonly temperature: string;
  readonly pressure: string;
  readonly windSpeed: string;
}

const decimalPattern = /^[-+]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][-+]?[0-9]+)?$/;

export function parseDecimal(text: string): number | undefined {
  if (!decimalPattern.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export interface Timestamp {
  date: Temporal.PlainDate;
  time: Temporal.PlainTime;
}

export function parseTimestamp(
  dateText: string,
  timeText: string,
): Timestamp | undefined {
  const date = parseDateKey(dateText);
  const time = parseTimeOfDay(timeText);
  if (!date || !time) return undefined;
  return { date, time };
}

/**
 * Renders the interchange row `YYYY_MM_DD HH:MM:SS <temp> <pressure> <wind>`.
 */
export function formatRecordLine(record: SensorRecord): string {
  return [
    formatDateKey(record.date, "_"),
    record.time.toString(),
    record.text.temperature,
    record.text.pressure,
    record.text.windSpeed,
  ].join(" ");
}

export function parseRecordLine(line: string, lineNumber: number): SensorRecord {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new MalformedDataError(
      lineNumber,
      `expected 5 fields, found ${fields.length}`,
    );
  }
  const [dateText = "", timeText = "", ...valueTexts] = fields;

  const timestamp = parseTimestamp(dateText, timeText);
  if (!timestamp) {
    throw new MalformedDataError(
      lineNumber,
      `bad timestamp "${dateText} ${timeText}"`,
    );
  }

  const values = valueTexts.map((text) => {
    const value = parseDecimal(text);
    if (value === undefined) {
      throw new MalformedDataError(lineNumber, `not a number: "${text}"`);
    }
    return value;
  });
  const [temperature = NaN, pressure = NaN, windSpeed = NaN] = values;
  const [temperatureText = "", pressureText = "", windSpeedText = ""] =
    valueTexts;

  return {
    ...timestamp,
    temperature,
    pressure,
    windSpeed,
    text: {
      temperature: temperatureText,
      pressure: pressureText,
      windSpeed: windSpeedText,
    },
  };
}
