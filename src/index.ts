/**
 * Library entry point
 */

export * from "./core";
export * from "./orchestrator";
export * from "./sites/pipeline";
export * from "./sites/registry";
export * from "./sites/urls";
export { createPageStateAdapter, type PageStateAdapterDeps } from "./sites/page-state/adapter";
export { createSearchIndexAdapter, fallbackKey, type SearchIndexAdapterDeps } from "./sites/search-index/adapter";
