import type { TokenErrorDetails } from "@/errors";

/**
 * The two halves of a bootstrap token. Anything with this shape can be
 * stringified or encoded, valid or not.
 */
export interface TokenParts {
    readonly id: string;
    readonly secret: string;
}

export type TokenResult<T> = { valid: true; data: T } | { valid: false; error: TokenErrorDetails };
