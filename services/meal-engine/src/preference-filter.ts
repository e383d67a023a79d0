import type { CatalogItem } from "@mealgen/contracts";

/** Below this many surviving items the allergy filter is dropped. */
export const MIN_VIABLE_CATALOG_SIZE = 10;

export interface AllergyFilterResult {
  items: CatalogItem[];
  excludedCount: number;
  /** True when the filter left too few items and the full catalog was used instead. */
  filterDiscarded: boolean;
}

/**
 * Accepts "cilantro; blue cheese, mayo" style text or a list of such entries.
 * Terms come back trimmed, lower-cased and unique, in first-seen order.
 */
export function normalizeAllergyTerms(raw: string | readonly string[] | null | undefined): string[] {
  if (raw == null) return [];
  const entries = typeof raw === "string" ? [raw] : raw;
  const terms = new Set<string>();
  for (const entry of entries) {
    for (const token of entry.split(/[,;]/)) {
      const term = token.trim().toLowerCase();
      if (term) terms.add(term);
    }
  }
  return [...terms];
}

function mentionsAny(name: string, terms: readonly string[]): boolean {
  const lowered = name.toLowerCase();
  return terms.some((term) => lowered.includes(term));
}

export function applyAllergyFilter(
  catalog: readonly CatalogItem[],
  allergies: string | readonly string[] | null | undefined
): AllergyFilterResult {
  const terms = normalizeAllergyTerms(allergies);
  if (terms.length === 0) {
    return { items: [...catalog], excludedCount: 0, filterDiscarded: false };
  }

  const kept = catalog.filter((item) => !mentionsAny(item.name, terms));
  if (kept.length < MIN_VIABLE_CATALOG_SIZE) {
    return { items: [...catalog], excludedCount: 0, filterDiscarded: true };
  }

  return { items: kept, excludedCount: catalog.length - kept.length, filterDiscarded: false };
}
