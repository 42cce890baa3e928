import { DEFAULTS } from "@resdesk/core";

/** Caps a list result and records how many records matched in total */
export function limitList<T>(records: T[], limit: number = DEFAULTS.LIST_DISPLAY_LIMIT) {
  return {
    total: records.length,
    truncated: records.length > limit,
    items: records.slice(0, limit),
  };
}

/** "status 'Active' and sponsor 'NSF'" for the filters that were given */
export function describeFilters(filters: Record<string, string | undefined>): string {
  return Object.entries(filters)
    .filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== "")
    .map(([field, value]) => `${field} '${value}'`)
    .join(" and ");
}
