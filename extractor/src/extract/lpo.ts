import type { Temporal } from "@js-temporal/polyfill";
import { DATA_BASE_URL, FETCH_USER_AGENT } from "../config.ts";
import { formatDateKey } from "../dates.ts";
import { DateNotFoundError, TransportError } from "../errors.ts";
import { logger } from "../logger.ts";
import { withSpan } from "../tracing.ts";

/*
Pages live at e.g.
  http://lpo.dt.navy.mil/data/DM/2015/2015_02_03/Air_Temp
and are plain text, one sample per line:
  2015_02_03 00:01:11 38.86\r\n
*/

export const seriesNames = {
  airTemperature: "Air_Temp",
  barometricPressure: "Barometric_Press",
  windSpeed: "Wind_Speed",
} as const;

export type SeriesKey = keyof typeof seriesNames;

export type SeriesTables = Record<SeriesKey, string>;

export type FetchFn = (
  url: string,
  init?: RequestInit,
) => Promise<Response>;

export interface FetchOptions {
  baseUrl?: string;
  fetchFn?: FetchFn;
}

// The server redirects to this page for dates it has no data for.
const errorPageMarker = "error.html";

export function isErrorPage(body: string): boolean {
  return body.includes(errorPageMarker);
}

function ensureDataPage(body: string, date: Temporal.PlainDate): string {
  if (isErrorPage(body)) {
    throw new DateNotFoundError(
      `Web page error reported for ${date.toString()}. Confirm correct date.`,
    );
  }
  return body;
}

export function seriesUrl(
  baseUrl: string,
  series: SeriesKey,
  date: Temporal.PlainDate,
): string {
  const year = String(date.year).padStart(4, "0");
  const day = formatDateKey(date, "_");
  return `${baseUrl.replace(/\/+$/, "")}/${year}/${day}/${seriesNames[series]}`;
}

export async function fetchSeriesTable(
  url: string,
  fetchFn: FetchFn = fetch,
): Promise<string> {
  return withSpan(
    "fetch-series-table",
    async (span) => {
      let response: Response;
      let body: string;
      try {
        response = await fetchFn(url, {
          redirect: "follow",
          headers: { "user-agent": FETCH_USER_AGENT },
        });
        body = await response.text();
      } catch (e) {
        throw new TransportError(url, `Request to ${url} failed: ${String(e)}`, {
          cause: e,
        });
      }

      // A missing date may come back as an error status; the page says so.
      if (!response.ok && !isErrorPage(body)) {
        throw new TransportError(
          url,
          `Unexpected response from ${url}: ${response.status} ${response.statusText}`,
        );
      }

      const bytes = Buffer.byteLength(body);
      span.setAttribute("bytes", bytes);
      logger.debug({ url, bytes }, "Fetched series table");
      return body;
    },
    { url },
  );
}

/**
 * Fetches the three series for a date. Air temperature goes first: when that
 * page is the error page, all three are missing and nothing else is fetched.
 */
export async function fetchDailyTables(
  date: Temporal.PlainDate,
  { baseUrl = DATA_BASE_URL, fetchFn = fetch }: FetchOptions = {},
): Promise<SeriesTables> {
  const airTemperature = ensureDataPage(
    await fetchSeriesTable(seriesUrl(baseUrl, "airTemperature", date), fetchFn),
    date,
  );
  const barometricPressure = ensureDataPage(
    await fetchSeriesTable(
      seriesUrl(baseUrl, "barometricPressure", date),
      fetchFn,
    ),
    date,
  );
  const windSpeed = ensureDataPage(
    await fetchSeriesTable(seriesUrl(baseUrl, "windSpeed", date), fetchFn),
    date,
  );

  return { airTemperature, barometricPressure, windSpeed };
}
