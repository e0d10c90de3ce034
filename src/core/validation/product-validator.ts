/**
 * Product record validation. Never throws: callers count and skip.
 */

import { isAvailability } from "../product/availability";
import type { ProductRecord, RecordCandidate } from "../types/product";
import type { Logger } from "../utils/logger";

export interface RecordIssue {
  field: keyof ProductRecord;
  message: string;
}

const isNonEmpty = (v: unknown): v is string => typeof v === "string" && v.trim().length > 0;

const isNonNegative = (v: number | null) => v == null || (Number.isFinite(v) && v >= 0);

/** First problem found, or null when the record may be persisted */
export function findRecordIssue(record: RecordCandidate): RecordIssue | null {
  if (!isNonEmpty(record.store)) return { field: "store", message: "store must be a non-empty string" };
  if (!isNonEmpty(record.site_slug)) {
    return { field: "site_slug", message: "site_slug must be a non-empty string" };
  }
  if (!isNonEmpty(record.name)) return { field: "name", message: "name must be a non-empty string" };
  if (!isNonNegative(record.price)) return { field: "price", message: "price must be a number >= 0" };
  if (!isNonNegative(record.unit_price)) {
    return { field: "unit_price", message: "unit_price must be a number >= 0" };
  }
  if (!isAvailability(record.availability)) {
    return {
      field: "availability",
      message: `availability "${record.availability}" is not one of in_stock, out_of_stock, unknown`,
    };
  }
  return null;
}

/**
 * Validates a candidate record; logs a warning naming the offending field
 * and the record's name when it fails.
 */
export function validateRecord(record: RecordCandidate, logger: Logger): record is ProductRecord {
  const issue = findRecordIssue(record);
  if (!issue) return true;
  logger.warn(
    { field: issue.field, name: record.name, site: record.site_slug, url: record.source_url },
    `Invalid record: ${issue.message}`,
  );
  return false;
}
