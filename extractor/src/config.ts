export const DATA_BASE_URL =
  process.env["LPO_DATA_BASE_URL"] ?? "http://lpo.dt.navy.mil/data/DM";

export const FETCH_USER_AGENT =
  process.env["FETCH_USER_AGENT"] ?? "lake-weather-tools/1.0";

// Logs go to stderr; keep them quiet unless asked for.
export const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "warn";
