import { runCheck } from "@/cli/check.ts";
import { flushLogger, getContext, initContext } from "@/core";

initContext();

const { logger } = getContext();

process.exitCode = runCheck(process.argv.slice(2), logger);

await flushLogger(logger);
