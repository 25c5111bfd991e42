export * from "./rules";
export {
  parseRegistry,
  serializeRegistry,
} from "./registry";
