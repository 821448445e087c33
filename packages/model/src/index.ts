export * from "./types";
export * from "./build";
export * from "./helpers";
export { Reflector, reflect } from "./reflect";
