import { WeatherToolError } from "../errors.ts";
import { logger } from "../logger.ts";

export interface CommandIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processIo: CommandIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Runs a command body, turning expected failures into a diagnostic line and
 * exit code 1. Unexpected errors are rethrown.
 */
export async function reportFailures(
  program: string,
  io: CommandIo,
  fn: () => Promise<number>,
): Promise<number> {
  try {
    return await fn();
  } catch (e) {
    if (!(e instanceof WeatherToolError)) throw e;
    logger.debug({ err: e }, `${program} failed`);
    io.stderr(`${program}: ${e.message}\n`);
    return 1;
  }
}
