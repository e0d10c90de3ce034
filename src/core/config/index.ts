export * from "./app-config";
export * from "./defaults";
export * from "./env";
export * from "./paths";
export * from "./reader";
export * from "./site-config";
