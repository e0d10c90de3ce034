export * from "./checkpoint";
export * from "./config";
export * from "./extraction";
export * from "./product";
export * from "./site";
