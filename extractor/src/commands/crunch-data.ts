import { readRecords } from "../aggregate/input.ts";
import { formatJsonSummary, formatTextSummary } from "../aggregate/output.ts";
import { collectSeries, summarize } from "../aggregate/summary.ts";
import { withSpan } from "../tracing.ts";
import { type CommandIo, processIo, reportFailures } from "./io.ts";

export interface CrunchDataOptions {
  io?: CommandIo;
  stdin?: NodeJS.ReadableStream;
}

export const crunchDataUsage = `crunch_data

Manipulates input provided by the fetch_data program,
generating mean and median for Air Temperature, Barometric
Pressure, and Wind Speed. Format:

crunch_data [--json] [--help]

--json   Output data in JSON format
--help   Show this message
`;

/**
 * `crunch_data [--json | --help]`, reading rows from stdin. Returns the
 * process exit code; `--help` exits with 1.
 */
export async function crunchDataCommand(
  args: readonly string[],
  { io = processIo, stdin = process.stdin }: CrunchDataOptions = {},
): Promise<number> {
  if (args.includes("--help")) {
    io.stdout(crunchDataUsage);
    return 1;
  }

  const json = args.includes("--json");
  if (args.some((it) => it !== "--json")) {
    io.stderr("crunch_data: Unknown argument(s) ignored.\n");
  }

  return reportFailures("crunch_data", io, async () => {
    const summary = await withSpan("crunch-data", async (span) => {
      const records = await readRecords(stdin);
      span.setAttribute("rows", records.length);
      return summarize(collectSeries(records));
    });

    io.stdout(json ? formatJsonSummary(summary) : formatTextSummary(summary));
    return 0;
  });
}
