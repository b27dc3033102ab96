import type { z } from "zod";
import { ErrorCode, isTokenError, TokenError } from "@/errors";
import { TOKEN_ID_PATTERN, TOKEN_PATTERN, TOKEN_SECRET_PATTERN, TOKEN_SEPARATOR } from "@/token/constants.ts";
import { tokenIdSchema, tokenSecretSchema } from "@/token/schemas.ts";
import type { TokenParts, TokenResult } from "@/token/types.ts";

function check(value: string, schema: z.ZodString, code: ErrorCode): string {
    const result = schema.safeParse(value);

    if (result.success) {
        return result.data;
    }

    throw new TokenError(code, result.error.issues[0]?.message);
}

/**
 * A validated bootstrap token.
 *
 * Instances only come out of {@link BootstrapToken.parse} and
 * {@link BootstrapToken.fromParts}, so both fields always satisfy the
 * grammar. The secret is sensitive: log the ID, never the whole token.
 */
export class BootstrapToken implements TokenParts {
    private constructor(
        readonly id: string,
        readonly secret: string,
    ) {
        Object.freeze(this);
    }

    static fromParts(id: string, secret: string): BootstrapToken {
        return new BootstrapToken(
            check(id, tokenIdSchema, ErrorCode.INVALID_TOKEN_ID),
            check(secret, tokenSecretSchema, ErrorCode.INVALID_TOKEN_SECRET),
        );
    }

    static parse(raw: string): BootstrapToken {
        const index = raw.indexOf(TOKEN_SEPARATOR);

        if (index === -1 || raw.includes(TOKEN_SEPARATOR, index + 1)) {
            throw new TokenError(
                ErrorCode.MALFORMED_TOKEN,
                `Token must contain exactly one "${TOKEN_SEPARATOR}" between the ID and the secret`,
            );
        }

        return BootstrapToken.fromParts(raw.slice(0, index), raw.slice(index + 1));
    }

    equals(other: TokenParts): boolean {
        return this.id === other.id && this.secret === other.secret;
    }

    toString(): string {
        return stringifyToken(this);
    }

    // JSON.stringify on an enclosing document yields a single string field
    toJSON(): string {
        return stringifyToken(this);
    }
}

export function parseToken(raw: string): BootstrapToken {
    return BootstrapToken.parse(raw);
}

export function createToken(id: string, secret: string): BootstrapToken {
    return BootstrapToken.fromParts(id, secret);
}

/** Combined form of whatever parts are given; does not validate. */
export function stringifyToken(parts: TokenParts): string {
    return `${parts.id}${TOKEN_SEPARATOR}${parts.secret}`;
}

export function toTokenResult<T>(operation: () => T): TokenResult<T> {
    try {
        return { valid: true, data: operation() };
    } catch (error) {
        if (isTokenError(error)) {
            return { valid: false, error: error.toDetails() };
        }
        throw error;
    }
}

export function safeParseToken(raw: string): TokenResult<BootstrapToken> {
    return toTokenResult(() => parseToken(raw));
}

export function isTokenId(value: string): boolean {
    return TOKEN_ID_PATTERN.test(value);
}

export function isTokenSecret(value: string): boolean {
    return TOKEN_SECRET_PATTERN.test(value);
}

export function isTokenString(value: string): boolean {
    return TOKEN_PATTERN.test(value);
}
