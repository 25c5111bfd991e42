export * from "./symbols";
export type * from "./symbols.types";
