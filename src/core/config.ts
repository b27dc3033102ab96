import { z } from "zod";
import { type Config, Environment, LogLevel } from "@/core/types.ts";

const DEFAULTS: Config = {
    logLevel: LogLevel.INFO,
    nodeEnv: Environment.DEVELOPMENT,
} as const;

const envSchema = z.object({
    LOG_LEVEL: z.enum(LogLevel).default(DEFAULTS.logLevel),
    NODE_ENV: z.enum(Environment).default(DEFAULTS.nodeEnv),
});

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const { success, data, error } = envSchema.safeParse(env);

    if (success) {
        return Object.freeze({
            logLevel: data.LOG_LEVEL,
            nodeEnv: data.NODE_ENV,
        });
    }

    console.error("Invalid environment variables:");
    for (const issue of error.issues) {
        console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
}
