export * from "./automation";
export * from "./errors";
export * from "./logger";
export * from "./macro";
export * from "./result";
export * from "./selector";
