export * from "./dirs";
export * from "./env";
export * as logger from "./logger";
