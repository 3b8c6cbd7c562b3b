import { createInterface } from "node:readline";
import { logger } from "../logger.ts";
import { parseRecordLine, type SensorRecord } from "../record.ts";

export async function* readLines(
  input: NodeJS.ReadableStream,
): AsyncGenerator<string> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    yield* lines;
  } finally {
    lines.close();
  }
}

/**
 * Parses every non-blank line of the input as an interchange row.
 */
export async function readRecords(
  input: NodeJS.ReadableStream,
): Promise<SensorRecord[]> {
  const records: SensorRecord[] = [];
  let lineNumber = 0;
  for await (const line of readLines(input)) {
    lineNumber++;
    if (line.trim() === "") continue;
    records.push(parseRecordLine(line, lineNumber));
  }
  logger.debug({ rows: records.length, lines: lineNumber }, "Read input rows");
  return records;
}
