/**
 * Centralized application configuration
 */

import { envBool, envStr } from "./env";

export class AppConfig {
  // Directories
  static readonly DATA_DIR = envStr("DATA_DIR", "data");
  static readonly CONFIG_DIR = envStr("CONFIG_DIR", "configs");
  static readonly LOGS_DIR = envStr("LOGS_DIR", "logs");
  static readonly LOG_ARCHIVE_DIR = envStr("LOG_ARCHIVE_DIR", "backup_logs");

  // Browser configuration
  static readonly HEADLESS = envBool("HEADLESS", true);

  // Logging configuration
  static readonly LOG_LEVEL = envStr("LOG_LEVEL", "info");
  static readonly PRETTY_LOGS = envStr("NODE_ENV", "development") !== "production";
}
