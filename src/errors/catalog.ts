export const ErrorCode = {
    MALFORMED_TOKEN: "MALFORMED_TOKEN",
    INVALID_TOKEN_ID: "INVALID_TOKEN_ID",
    INVALID_TOKEN_SECRET: "INVALID_TOKEN_SECRET",
    DECODE_ERROR: "DECODE_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorDefinition = Readonly<{
    code: number;
    httpStatus: number;
    message: string;
}>;

/**
 * Error catalog for token handling.
 *
 * Code ranges:
 * - 4000-4099: decode errors (the document around the token is broken)
 * - 4100-4199: grammar errors (the token itself is broken)
 */
export const ErrorCatalog: Record<ErrorCode, ErrorDefinition> = {
    DECODE_ERROR: {
        code: 4001,
        httpStatus: 400,
        message: "Token must be encoded as a JSON string",
    },

    MALFORMED_TOKEN: {
        code: 4100,
        httpStatus: 400,
        message: "Token must be of the form <id>.<secret>",
    },
    INVALID_TOKEN_ID: {
        code: 4101,
        httpStatus: 400,
        message: "Invalid token ID",
    },
    INVALID_TOKEN_SECRET: {
        code: 4102,
        httpStatus: 400,
        message: "Invalid token secret",
    },
} as const;
