export * from "./markers";
export type * from "./markers.types";
