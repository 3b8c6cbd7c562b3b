import { describe, expect, it } from "vitest";
import { MalformedDataError, MisalignedSourceError } from "../errors.ts";
import { formatRecordLine } from "../record.ts";
import { mergeTables, parseSourceLine, splitTableLines } from "./merge.ts";

const tables = {
  airTemperature:
    "2015_02_03 09:02:34 38.86\r\n2015_02_03 09:03:34 39.10\r\n",
  barometricPressure:
    "2015_02_03 09:02:34  30.07\r\n2015_02_03 09:03:34  30.06\r\n",
  windSpeed: "2015_02_03 09:02:34   3.00\r\n2015_02_03 09:03:34   4.50\r\n",
};

describe("splitTableLines", () => {
  it("splits on CRLF and LF and drops blank lines", () => {
    expect(splitTableLines("a\r\nb\n\r\nc  \r\n")).toEqual(["a", "b", "c"]);
  });
});

describe("parseSourceLine", () => {
  it("takes the value after the timestamp", () => {
    const sample = parseSourceLine(
      "barometricPressure",
      "2015_02_03 09:02:34  30.07",
      1,
    );
    expect(sample.value).toBe(30.07);
    expect(sample.record.date.toString()).toBe("2015-02-03");
    expect(sample.record.time.toString()).toBe("09:02:34");
  });

  it("rejects a line with no value", () => {
    expect(() =>
      parseSourceLine("airTemperature", "2015_02_03 09:02:34", 3),
    ).toThrow("line 3: Air_Temp: line too short");
  });

  it("rejects a value that is not a number", () => {
    expect(() =>
      parseSourceLine("windSpeed", "2015_02_03 09:02:34 n/a", 1),
    ).toThrow(new MalformedDataError(1, 'Wind_Speed: not a number: "n/a"'));
  });

  it("rejects a value that overflows", () => {
    expect(() =>
      parseSourceLine("airTemperature", "2015_02_03 09:02:34 1e999", 2),
    ).toThrow('line 2: Air_Temp: not a number: "1e999"');
  });

  it("rejects a line without a timestamp", () => {
    expect(() =>
      parseSourceLine("airTemperature", "<html><body>Not here</body></html>", 1),
    ).toThrow(MalformedDataError);
  });
});

describe("mergeTables", () => {
  it("joins the three tables line by line", () => {
    expect(mergeTables(tables).map(formatRecordLine)).toEqual([
      "2015_02_03 09:02:34 38.86 30.07 3.00",
      "2015_02_03 09:03:34 39.10 30.06 4.50",
    ]);
  });

  it("keeps the values' source text next to the parsed numbers", () => {
    const [first] = mergeTables({
      airTemperature: "2015_02_03 09:02:34 38.80\r\n",
      barometricPressure: "2015_02_03 09:02:34  30.07\r\n",
      windSpeed: "2015_02_03 09:02:34   3.00\r\n",
    });

    expect(first?.temperature).toBe(38.8);
    expect(first?.windSpeed).toBe(3);
    expect(first?.text).toEqual({
      temperature: "38.80",
      pressure: "30.07",
      windSpeed: "3.00",
    });
  });

  it("returns nothing for empty tables", () => {
    expect(
      mergeTables({ airTemperature: "", barometricPressure: "", windSpeed: "" }),
    ).toEqual([]);
  });

  it("refuses tables of different lengths", () => {
    const merge = () =>
      mergeTables({ ...tables, windSpeed: "2015_02_03 09:02:34   3.00\r\n" });

    expect(merge).toThrow(MisalignedSourceError);
    expect(merge).toThrow(
      "Series tables differ in length: Air_Temp has 2 lines, Barometric_Press has 2, Wind_Speed has 1",
    );
  });
});
