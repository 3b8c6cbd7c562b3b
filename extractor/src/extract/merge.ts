import { MalformedDataError, MisalignedSourceError } from "../errors.ts";
import { logger } from "../logger.ts";
import { parseDecimal, parseTimestamp, type SensorRecord } from "../record.ts";
import { type SeriesKey, type SeriesTables, seriesNames } from "./lpo.ts";

// "2015_02_03 09:02:34" precedes the value on every line.
const timestampLength = 19;

export interface SourceSample {
  record: Pick<SensorRecord, "date" | "time">;
  value: number;
  text: string;
}

export function splitTableLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}

export function parseSourceLine(
  series: SeriesKey,
  line: string,
  lineNumber: number,
): SourceSample {
  const name = seriesNames[series];
  if (line.length <= timestampLength) {
    throw new MalformedDataError(lineNumber, `${name}: line too short`);
  }

  const timestamp = parseTimestamp(
    line.slice(0, 10),
    line.slice(11, timestampLength),
  );
  if (!timestamp || line[10] !== " ") {
    throw new MalformedDataError(
      lineNumber,
      `${name}: bad timestamp "${line.slice(0, timestampLength)}"`,
    );
  }

  const valueText = line.slice(timestampLength).trim();
  const value = parseDecimal(valueText);
  if (value === undefined) {
    throw new MalformedDataError(
      lineNumber,
      `${name}: not a number: "${valueText}"`,
    );
  }

  return { record: timestamp, value, text: valueText };
}

/**
 * Joins the three tables line by line. Date and time come from the air
 * temperature table.
 */
export function mergeTables(tables: SeriesTables): SensorRecord[] {
  const temperatureLines = splitTableLines(tables.airTemperature);
  const pressureLines = splitTableLines(tables.barometricPressure);
  const windLines = splitTableLines(tables.windSpeed);

  if (
    temperatureLines.length !== pressureLines.length ||
    temperatureLines.length !== windLines.length
  ) {
    throw new MisalignedSourceError(
      `Series tables differ in length: ${seriesNames.airTemperature} has ${temperatureLines.length} lines, ` +
        `${seriesNames.barometricPressure} has ${pressureLines.length}, ` +
        `${seriesNames.windSpeed} has ${windLines.length}`,
    );
  }

  const records = temperatureLines.map((line, index): SensorRecord => {
    const lineNumber = index + 1;
    const temperature = parseSourceLine("airTemperature", line, lineNumber);
    const pressure = parseSourceLine(
      "barometricPressure",
      pressureLines[index] ?? "",
      lineNumber,
    );
    const wind = parseSourceLine("windSpeed", windLines[index] ?? "", lineNumber);
    return {
      ...temperature.record,
      temperature: temperature.value,
      pressure: pressure.value,
      windSpeed: wind.value,
      text: {
        temperature: temperature.text,
        pressure: pressure.text,
        windSpeed: wind.text,
      },
    };
  });

  logger.debug({ lines: records.length }, "Merged series tables");
  return records;
}
