export { ErrorCatalog, ErrorCode } from "./catalog.ts";
export type { ErrorDefinition } from "./catalog.ts";
export { isTokenError, TokenError } from "./token-error.ts";
export type { TokenErrorDetails } from "./token-error.ts";
