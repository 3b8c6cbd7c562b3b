import { shutdownInstrumentation } from "../instrumentation.ts";
import { crunchDataCommand } from "../commands/crunch-data.ts";

process.exitCode = await crunchDataCommand(process.argv.slice(2));
await shutdownInstrumentation();
