import { Temporal } from "@js-temporal/polyfill";
import { DATA_BASE_URL } from "../config.ts";
import { parseDateArgument } from "../dates.ts";
import { type FetchFn, fetchDailyTables } from "../extract/lpo.ts";
import { mergeTables } from "../extract/merge.ts";
import { formatRecordLine } from "../record.ts";
import { withSpan } from "../tracing.ts";
import { type CommandIo, processIo, reportFailures } from "./io.ts";

export interface FetchDataOptions {
  io?: CommandIo;
  fetchFn?: FetchFn;
  baseUrl?: string;
  today?: () => Temporal.PlainDate;
}

export const fetchDataUsage = `fetch_data

Fetches air temperature, barometric pressure, and wind speed data from
http://lpo.dt.navy.mil/, Acoustic Research Dept. Lake Pend Oreille, ID

No options: Fetch current day's data (results may be incomplete)
YYYYMMDD    Fetch data for given date
--help      Show this message

Output is in the format: Date Time Air_temp Bar_press Wind_speed
`;

/**
 * `fetch_data [YYYYMMDD | --help]`. Returns the process exit code.
 */
export async function fetchDataCommand(
  args: readonly string[],
  {
    io = processIo,
    fetchFn = fetch,
    baseUrl = DATA_BASE_URL,
    today = () => Temporal.Now.plainDateISO(),
  }: FetchDataOptions = {},
): Promise<number> {
  const [arg] = args;

  if (arg === "--help") {
    io.stdout(fetchDataUsage);
    return 0;
  }

  return reportFailures("fetch_data", io, async () => {
    const date = arg === undefined ? today() : parseDateArgument(arg);

    const records = await withSpan(
      "fetch-data",
      async () => mergeTables(await fetchDailyTables(date, { baseUrl, fetchFn })),
      { date: date.toString() },
    );

    io.stdout(records.map((it) => formatRecordLine(it) + "\n").join(""));
    return 0;
  });
}
