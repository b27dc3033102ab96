import { z } from "zod";
import { ErrorCode, TokenError } from "@/errors";
import { type BootstrapToken, parseToken, safeParseToken, stringifyToken, toTokenResult } from "@/token/token.ts";
import type { TokenParts, TokenResult } from "@/token/types.ts";

const utf8 = new TextDecoder("utf-8", { fatal: true });

function describeJsonValue(value: unknown): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    return typeof value;
}

function readText(json: string | Uint8Array): string {
    if (typeof json === "string") {
        return json;
    }

    try {
        return utf8.decode(json);
    } catch (error) {
        throw new TokenError(ErrorCode.DECODE_ERROR, "Token document is not valid UTF-8", { cause: error });
    }
}

/**
 * JSON literal of the combined form. Pure string operation: the parts are
 * not validated, so `{ id: "", secret: "" }` encodes to `"."`.
 */
export function encodeToken(parts: TokenParts): string {
    return JSON.stringify(stringifyToken(parts));
}

/**
 * Decodes a JSON string literal into a token. Anything other than a JSON
 * string fails with DECODE_ERROR; grammar errors from {@link parseToken}
 * pass through unchanged.
 */
export function decodeToken(json: string | Uint8Array): BootstrapToken {
    const text = readText(json);

    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (error) {
        throw new TokenError(ErrorCode.DECODE_ERROR, undefined, { cause: error });
    }

    if (typeof value !== "string") {
        throw new TokenError(ErrorCode.DECODE_ERROR, `Token must be a JSON string, got ${describeJsonValue(value)}`);
    }

    return parseToken(value);
}

export function safeDecodeToken(json: string | Uint8Array): TokenResult<BootstrapToken> {
    return toTokenResult(() => decodeToken(json));
}

/** Schema for a token embedded as a string field of a larger document. */
export const tokenStringSchema = z.string().transform((raw, ctx) => {
    const result = safeParseToken(raw);

    if (result.valid) {
        return result.data;
    }

    ctx.issues.push({ code: "custom", message: result.error.message, input: raw });
    return z.NEVER;
});
