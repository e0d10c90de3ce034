export * from "./availability";
export * from "./category";
export * from "./price";
export * from "./record";
export * from "./text";
export * from "./unit-price";
