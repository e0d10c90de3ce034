import { RECORD_CONSTANTS } from "../constants";
import { asString, isRecord } from "../utils/json";

/** Joins breadcrumb levels (strings or {name}/{title} objects) with " > " */
export function joinCategoryPath(levels: unknown): string | null {
  if (!Array.isArray(levels)) return asString(levels);
  const names = levels
    .map((level) => (isRecord(level) ? asString(level.name) ?? asString(level.title) : asString(level)))
    .filter((name): name is string => name != null);
  return names.length > 0 ? names.join(RECORD_CONSTANTS.CATEGORY_SEPARATOR) : null;
}

/**
 * Most specific level of a hierarchical facet ({lvl0, lvl1, lvl2}); a level may
 * be a string or a list whose first element counts.
 */
export function mostSpecificCategory(hierarchy: unknown): string | null {
  if (!isRecord(hierarchy)) return null;
  for (const key of ["lvl3", "lvl2", "lvl1", "lvl0"]) {
    const level = hierarchy[key];
    const value = Array.isArray(level) ? asString(level[0]) : asString(level);
    if (value) return value;
  }
  return null;
}
