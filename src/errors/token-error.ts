import { ErrorCatalog, type ErrorCode, type ErrorDefinition } from "@/errors/catalog.ts";

export type TokenErrorDetails = Readonly<{
    code: ErrorCode;
    message: string;
}>;

/**
 * Raised by every token operation. Messages describe the failed rule and
 * never echo the secret.
 */
export class TokenError extends Error {
    readonly code: ErrorCode;
    readonly definition: ErrorDefinition;

    constructor(code: ErrorCode, customMessage?: string, options?: { cause?: unknown }) {
        const definition = ErrorCatalog[code];
        super(customMessage ?? definition.message, options);
        this.name = "TokenError";
        this.code = code;
        this.definition = definition;
    }

    toDetails(): TokenErrorDetails {
        return { code: this.code, message: this.message };
    }
}

export function isTokenError(error: unknown): error is TokenError {
    return error instanceof TokenError;
}
