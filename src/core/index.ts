export { createConfig } from "./config.ts";
export { getContext, initContext, resetContext } from "./context.ts";
export { createLogger, flushLogger, serializeToken } from "./logger.ts";
export type { Logger } from "./logger.ts";
export { Environment, LogLevel } from "./types.ts";
export type { Config } from "./types.ts";
