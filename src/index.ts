export * from "./errors/index.ts";
export * from "./token/index.ts";
