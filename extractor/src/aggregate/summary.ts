import { formatDateKey } from "../dates.ts";
import { NoDataError } from "../errors.ts";
import type { SensorRecord } from "../record.ts";
import { mean, median } from "./statistics.ts";

export interface SeriesSet {
  /** `YYYY-MM-DD` of the first row. */
  dateKey: string;
  airTemperature: number[];
  barometricPressure: number[];
  windSpeed: number[];
}

export type SeriesName = Exclude<keyof SeriesSet, "dateKey">;

export const seriesOrder: readonly SeriesName[] = [
  "airTemperature",
  "barometricPressure",
  "windSpeed",
];

export interface SeriesStatistics {
  mean: number | undefined;
  median: number | undefined;
}

export interface Summary {
  dateKey: string;
  series: Record<SeriesName, SeriesStatistics>;
}

export function collectSeries(records: readonly SensorRecord[]): SeriesSet {
  const first = records[0];
  if (!first) {
    throw new NoDataError("No data rows on input");
  }

  return {
    dateKey: formatDateKey(first.date, "-"),
    airTemperature: records.map((it) => it.temperature),
    barometricPressure: records.map((it) => it.pressure),
    windSpeed: records.map((it) => it.windSpeed),
  };
}

export function summarize(series: SeriesSet): Summary {
  const statistics = (values: number[]): SeriesStatistics => ({
    mean: mean(values),
    median: median(values),
  });

  return {
    dateKey: series.dateKey,
    series: {
      airTemperature: statistics(series.airTemperature),
      barometricPressure: statistics(series.barometricPressure),
      windSpeed: statistics(series.windSpeed),
    },
  };
}
