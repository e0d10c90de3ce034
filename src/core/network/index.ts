export * from "./fingerprints";
export * from "./header-order";
export * from "./proxy-manager";
export * from "./tls-client";
export * from "./transport";
