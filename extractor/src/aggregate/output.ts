import { type SeriesName, type Summary, seriesOrder } from "./summary.ts";

const seriesTitles: Record<SeriesName, string> = {
  airTemperature: "Air Temperature",
  barometricPressure: "Barometric Pressure",
  windSpeed: "Wind Speed",
};

function formatStatistic(value: number | undefined): string {
  return value === undefined ? "no data" : value.toFixed(6);
}

export function formatTextSummary(summary: Summary): string {
  const lines = [summary.dateKey];
  for (const name of seriesOrder) {
    const statistics = summary.series[name];
    lines.push(
      `\t${seriesTitles[name]}`,
      `\t\tMean\t${formatStatistic(statistics.mean)}`,
      `\t\tMedian\t${formatStatistic(statistics.median)}`,
    );
  }
  return lines.join("\n") + "\n";
}

export function formatJsonSummary(summary: Summary): string {
  // undefined would drop the key; null keeps the shape.
  const body = Object.fromEntries(
    seriesOrder.map((name) => {
      const { mean, median } = summary.series[name];
      return [name, { mean: mean ?? null, median: median ?? null }];
    }),
  );
  return JSON.stringify({ [summary.dateKey]: body }, undefined, "  ") + "\n";
}
