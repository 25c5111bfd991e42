export * from "./listing";
export * from "./mask";
