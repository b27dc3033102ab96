import type { Logger } from "@/core";
import { safeDecodeToken, safeParseToken } from "@/token";

export const ExitCode = {
    OK: 0,
    INVALID: 1,
    USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export const USAGE = "Usage: bootstrap-token check [--json] <token>...";

interface CheckArgs {
    json: boolean;
    inputs: string[];
}

function parseArgs(argv: readonly string[]): CheckArgs | null {
    const [command, ...rest] = argv;
    if (command !== "check") return null;

    const json = rest.includes("--json");
    const inputs = rest.filter(arg => arg !== "--json");

    return inputs.length > 0 ? { json, inputs } : null;
}

/**
 * Validates every token argument and logs one line per token. Failures are
 * logged by argument position since the input may carry a secret.
 */
export function runCheck(argv: readonly string[], logger: Logger): ExitCode {
    const args = parseArgs(argv);

    if (args === null) {
        logger.error(USAGE);
        return ExitCode.USAGE;
    }

    let failures = 0;

    args.inputs.forEach((input, index) => {
        const result = args.json ? safeDecodeToken(input) : safeParseToken(input);

        if (result.valid) {
            logger.info({ index, token: result.data }, "Token is valid");
            return;
        }

        failures++;
        logger.warn({ index, code: result.error.code }, result.error.message);
    });

    logger.debug({ checked: args.inputs.length, failures }, "Check complete");

    return failures === 0 ? ExitCode.OK : ExitCode.INVALID;
}
