export * from "./backup";
export * from "./checkpoint";
export * from "./csv-export";
export * from "./jsonl";
export * from "./record-store";
