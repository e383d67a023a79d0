/**
 * Categorizer
 *
 * Assigns catalog items to a coarse meal role (protein / vegetable /
 * carbohydrate / snack) by keyword search over category path + name.
 * Keyword lists are configuration; bucket order and backfill are fixed.
 */

import {
  MEAL_BUCKETS,
  type BucketKeywords,
  type CatalogItem,
  type ItemClassification,
  type MealBucket
} from "@mealgen/contracts";

export type CategorizableItem = Pick<CatalogItem, "name" | "categoryPath">;

export type CatalogBuckets = Record<MealBucket, CatalogItem[]>;

export interface BucketingResult {
  buckets: CatalogBuckets;
  /** Buckets that matched nothing and were refilled with the whole input. */
  backfilled: MealBucket[];
  unclassifiedCount: number;
}

function searchText(item: CategorizableItem): string {
  return `${item.categoryPath ?? ""} ${item.name}`.toLowerCase();
}

function matchesAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => {
    const token = keyword.trim().toLowerCase();
    return token.length > 0 && text.includes(token);
  });
}

/**
 * First matching bucket wins, in the order protein, vegetable, carbohydrate, snack.
 */
export function classifyItem(item: CategorizableItem, keywords: BucketKeywords): ItemClassification {
  const text = searchText(item);
  for (const bucket of MEAL_BUCKETS) {
    if (matchesAny(text, keywords[bucket])) return bucket;
  }
  return "unclassified";
}

/**
 * Split items into the four buckets. A bucket left empty is backfilled with
 * every input item so each meal slot can always be filled.
 */
export function bucketCatalog(items: readonly CatalogItem[], keywords: BucketKeywords): BucketingResult {
  const buckets: CatalogBuckets = { protein: [], vegetable: [], carbohydrate: [], snack: [] };
  let unclassifiedCount = 0;

  for (const item of items) {
    const classification = classifyItem(item, keywords);
    if (classification === "unclassified") {
      unclassifiedCount += 1;
      continue;
    }
    buckets[classification].push(item);
  }

  const backfilled: MealBucket[] = [];
  for (const bucket of MEAL_BUCKETS) {
    if (buckets[bucket].length === 0) {
      buckets[bucket] = [...items];
      backfilled.push(bucket);
    }
  }

  return { buckets, backfilled, unclassifiedCount };
}
