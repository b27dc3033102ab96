import { createLogger, type Logger } from "@/core";
import type { LogLevel } from "@/core/types.ts";

export interface CapturedLogger {
    logger: Logger;
    entries: () => Record<string, unknown>[];
    raw: string[];
}

/** A JSON logger writing into memory instead of stdout. */
export function createCapturedLogger(logLevel: LogLevel = "info"): CapturedLogger {
    const raw: string[] = [];
    const logger = createLogger({ logLevel, nodeEnv: "test" }, { write: (line: string) => void raw.push(line) });

    return {
        logger,
        raw,
        entries: () => raw.map(line => JSON.parse(line) as Record<string, unknown>),
    };
}
