import pino from "pino";

import type { Config } from "@/core/types.ts";
import type { TokenParts } from "@/token";

export type Logger = pino.Logger;

/** Renders a token by its public ID only. */
export function serializeToken(token: TokenParts): { id: string } {
    return { id: token.id };
}

export function createLogger(config: Config, destination?: pino.DestinationStream): Logger {
    const serializers = {
        err: pino.stdSerializers.err,
        token: serializeToken,
    };

    if (config.nodeEnv === "development" && destination === undefined) {
        return pino({
            level: config.logLevel,
            serializers,
            transport: {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "yyyy-mm-dd'T'HH:MM:ss.l'Z'",
                    ignore: "pid,hostname",
                },
            },
        });
    }

    const options: pino.LoggerOptions = {
        level: config.logLevel,
        serializers,
        formatters: {
            level: label => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    return destination === undefined ? pino(options) : pino(options, destination);
}

export async function flushLogger(logger: Logger): Promise<void> {
    return new Promise<void>(resolve => {
        logger.flush((error?: Error) => {
            if (error) console.error("Logger flush error:", error);
            resolve();
        });
    });
}
