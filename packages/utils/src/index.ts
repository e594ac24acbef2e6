export * from "./logger";
export * from "./math";
export * from "./shape";
export * from "./identifier";
export * from "./dispatchUtils";
export * from "./registry";
