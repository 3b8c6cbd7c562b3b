/**
 * Base class for the failures the CLIs report as a one-line diagnostic.
 * Anything else that is thrown is a bug and propagates.
 */
export class WeatherToolError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UsageError extends WeatherToolError {}

/** The request failed or the server answered with a non-2xx status. */
export class TransportError extends WeatherToolError {
  readonly url: string;
  constructor(url: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.url = url;
  }
}

/** The data source has no page for the requested date. */
export class DateNotFoundError extends WeatherToolError {}

/** The three series tables cannot be merged line by line. */
export class MisalignedSourceError extends WeatherToolError {}

export class MalformedDataError extends WeatherToolError {
  readonly lineNumber: number;
  constructor(lineNumber: number, message: string) {
    super(`line ${lineNumber}: ${message}`);
    this.lineNumber = lineNumber;
  }
}

export class NoDataError extends WeatherToolError {}
