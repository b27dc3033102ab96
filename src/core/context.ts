import { createConfig } from "@/core/config.ts";
import { createLogger, type Logger } from "@/core/logger.ts";
import type { Config } from "@/core/types.ts";

interface AppContext {
    config: Config;
    logger: Logger;
}

let context: AppContext | null = null;

export function initContext(): AppContext {
    if (context) throw new Error("Context already initialized");

    const config = createConfig();
    const logger = createLogger(config);

    context = Object.freeze({ config, logger });
    return context;
}

export function getContext(): AppContext {
    if (!context) throw new Error("Context not initialized");
    return context;
}

export function resetContext(): void {
    if (process.env.NODE_ENV !== "test") {
        throw new Error("Reset only available in test environment");
    }
    context = null;
}
