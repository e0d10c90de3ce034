/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Errors
export * from "./errors";

// Types
export * from "./types/index";

// Config
export * from "./config/index";

// Product records
export * from "./product/index";

// Validation
export * from "./validation/index";

// Pacing
export * from "./pacing/index";

// Network identity
export * from "./network/index";

// Store rotation
export * from "./stores/index";

// Browser
export * from "./browser/index";

// Fetching
export * from "./fetch/index";

// Extraction
export * from "./extraction/index";

// Normalization
export * from "./normalization/index";

// Storage
export * from "./storage/index";

// Utils
export * from "./utils/index";

// Services
export * from "./services/scrape-service";
