export * from "./registration";
export type * from "./registration.types";
