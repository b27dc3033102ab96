/**
 * Bootstrap token grammar.
 *
 * Combined form: `<id>.<secret>`, e.g. `abcdef.0123456789abcdef`.
 */

/** Length of the public token ID */
export const TOKEN_ID_LENGTH = 6;

/** Accepted secret lengths. Anything in between is rejected. */
export const TOKEN_SECRET_SIZES = [16, 24] as const;

export type TokenSecretSize = (typeof TOKEN_SECRET_SIZES)[number];

export const TOKEN_SEPARATOR = ".";

export const TOKEN_ID_PATTERN = /^[a-z0-9]{6}$/;

export const TOKEN_SECRET_PATTERN = /^(?:[a-z0-9]{16}|[a-z0-9]{24})$/;

export const TOKEN_PATTERN = /^[a-z0-9]{6}\.(?:[a-z0-9]{16}|[a-z0-9]{24})$/;
