export * from "./store-rotator";
