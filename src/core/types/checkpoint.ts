/**
 * Checkpoint and statistics types (persisted as JSON, snake_case keys)
 */

export interface RunStats {
  total_scraped: number;
  duplicates_skipped: number;
  invalid_records: number;
  pages_processed: number;
  errors: number;
}

export interface CheckpointState {
  seen_keys: string[];
  stats: RunStats;
  last_updated: string;
}
