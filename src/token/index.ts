export { decodeToken, encodeToken, safeDecodeToken, tokenStringSchema } from "./codec.ts";
export {
    TOKEN_ID_LENGTH,
    TOKEN_ID_PATTERN,
    TOKEN_PATTERN,
    TOKEN_SECRET_PATTERN,
    TOKEN_SECRET_SIZES,
    TOKEN_SEPARATOR,
} from "./constants.ts";
export type { TokenSecretSize } from "./constants.ts";
export { tokenIdSchema, tokenSecretSchema } from "./schemas.ts";
export {
    BootstrapToken,
    createToken,
    isTokenId,
    isTokenSecret,
    isTokenString,
    parseToken,
    safeParseToken,
    stringifyToken,
} from "./token.ts";
export type { TokenParts, TokenResult } from "./types.ts";
