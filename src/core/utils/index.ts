export * from "./date";
export * from "./json";
export * from "./log-files";
export * from "./logger";
export * from "./retry";
export * from "./sleep";
export * from "./url";
