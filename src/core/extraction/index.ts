export * from "./chain";
export * from "./dom";
export * from "./html";
export * from "./linked-data";
export * from "./page-state";
export * from "./search-hits";
