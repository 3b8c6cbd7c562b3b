import { shutdownInstrumentation } from "../instrumentation.ts";
import { fetchDataCommand } from "../commands/fetch-data.ts";

process.exitCode = await fetchDataCommand(process.argv.slice(2));
await shutdownInstrumentation();
