export * from "./browser-fetcher";
export * from "./http-fetcher";
export * from "./search-api-fetcher";
