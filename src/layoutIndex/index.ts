export * from "./layoutIndex";
export type * from "./layoutIndex.types";
