import { z } from "zod";
import { TOKEN_ID_LENGTH, TOKEN_ID_PATTERN, TOKEN_SECRET_PATTERN, TOKEN_SECRET_SIZES } from "@/token/constants.ts";

export const tokenIdSchema = z.string().regex(TOKEN_ID_PATTERN, {
    message: `Token ID must be exactly ${TOKEN_ID_LENGTH} characters of [a-z0-9]`,
});

export const tokenSecretSchema = z.string().regex(TOKEN_SECRET_PATTERN, {
    message: `Token secret must be ${TOKEN_SECRET_SIZES.join(" or ")} characters of [a-z0-9]`,
});
