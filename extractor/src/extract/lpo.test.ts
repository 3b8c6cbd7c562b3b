import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it, vi } from "vitest";
import { DateNotFoundError, TransportError } from "../errors.ts";
import {
  type FetchFn,
  fetchDailyTables,
  fetchSeriesTable,
  seriesUrl,
} from "./lpo.ts";

const baseUrl = "http://lpo.example.test/data/DM";
const date = Temporal.PlainDate.from("2015-02-03");

const airUrl = `${baseUrl}/2015/2015_02_03/Air_Temp`;
const pressureUrl = `${baseUrl}/2015/2015_02_03/Barometric_Press`;
const windUrl = `${baseUrl}/2015/2015_02_03/Wind_Speed`;

function fakeFetch(bodies: Record<string, string>) {
  return vi.fn<FetchFn>(async (url) => new Response(bodies[url] ?? ""));
}

describe("seriesUrl", () => {
  it("builds the address from year, date and series", () => {
    expect(seriesUrl(baseUrl, "windSpeed", date)).toBe(windUrl);
    expect(seriesUrl(`${baseUrl}/`, "airTemperature", date)).toBe(airUrl);
  });
});

describe("fetchSeriesTable", () => {
  it("returns the body text", async () => {
    const fetchFn = fakeFetch({ [airUrl]: "2015_02_03 09:02:34 38.86\r\n" });

    await expect(fetchSeriesTable(airUrl, fetchFn)).resolves.toBe(
      "2015_02_03 09:02:34 38.86\r\n",
    );
    expect(fetchFn).toHaveBeenCalledWith(
      airUrl,
      expect.objectContaining({ redirect: "follow" }),
    );
  });

  it("fails on a non-2xx status", async () => {
    const fetchFn = vi.fn<FetchFn>(
      async () =>
        new Response("", { status: 500, statusText: "Internal Server Error" }),
    );

    await expect(fetchSeriesTable(airUrl, fetchFn)).rejects.toThrow(
      new TransportError(
        airUrl,
        `Unexpected response from ${airUrl}: 500 Internal Server Error`,
      ),
    );
  });

  it("returns an error page even with a non-2xx status", async () => {
    const fetchFn = vi.fn<FetchFn>(
      async () =>
        new Response('<a href="/error.html">Not Found</a>', { status: 404 }),
    );

    await expect(fetchSeriesTable(airUrl, fetchFn)).resolves.toBe(
      '<a href="/error.html">Not Found</a>',
    );
  });

  it("wraps a rejected request", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(fetchSeriesTable(airUrl, fetchFn)).rejects.toThrow(
      `Request to ${airUrl} failed: TypeError: fetch failed`,
    );
  });
});

describe("fetchDailyTables", () => {
  it("fetches the three series in order", async () => {
    const fetchFn = fakeFetch({
      [airUrl]: "air",
      [pressureUrl]: "pressure",
      [windUrl]: "wind",
    });

    await expect(fetchDailyTables(date, { baseUrl, fetchFn })).resolves.toEqual({
      airTemperature: "air",
      barometricPressure: "pressure",
      windSpeed: "wind",
    });
    expect(fetchFn.mock.calls.map(([url]) => url)).toEqual([
      airUrl,
      pressureUrl,
      windUrl,
    ]);
  });

  it("stops after the error page", async () => {
    const fetchFn = fakeFetch({
      [airUrl]: '<html><meta http-equiv="refresh" content="0; url=/error.html"></html>',
    });

    await expect(fetchDailyTables(date, { baseUrl, fetchFn })).rejects.toThrow(
      DateNotFoundError,
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("treats a 404 error page as a missing date", async () => {
    const fetchFn = vi.fn<FetchFn>(
      async () =>
        new Response('<a href="/error.html">Not Found</a>', { status: 404 }),
    );

    await expect(fetchDailyTables(date, { baseUrl, fetchFn })).rejects.toThrow(
      "Web page error reported for 2015-02-03. Confirm correct date.",
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
