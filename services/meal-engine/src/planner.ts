/**
 * Deterministic Planner
 *
 * Builds N days of Breakfast / Lunch / Dinner from a store catalog.
 * One seeded generator drives every pick, so the same user, store, start date
 * and day count always produce the same document.
 */

import { addDays, format, isValid, parseISO } from "date-fns";
import type {
  BucketKeywords,
  CatalogItem,
  DayPlan,
  GeneratedPlanDocument,
  MealBucket,
  PlanItemRef,
  PreferenceSummary
} from "@mealgen/contracts";
import { bucketCatalog, type CatalogBuckets } from "./categorizer.js";
import { InvalidInputError, NoItemsForStoreError } from "./errors.js";
import { applyAllergyFilter, normalizeAllergyTerms } from "./preference-filter.js";
import { createSeededRandom, stableSeed, type SeededRandom } from "./seeded-random.js";

export const MIN_PLAN_DAYS = 1;
export const MAX_PLAN_DAYS = 14;

export interface CatalogPreparation {
  catalogSize: number;
  filteredSize: number;
  excludedCount: number;
  filterDiscarded: boolean;
  backfilledBuckets: MealBucket[];
  unclassifiedCount: number;
}

export interface GenerateMealPlanInput {
  userId: string | number;
  store: string;
  dayCount: number;
  preferences: PreferenceSummary | null;
  catalog: readonly CatalogItem[];
  /** First plan day, YYYY-MM-DD. */
  today: string;
  keywords: BucketKeywords;
  onPrepared?: (summary: CatalogPreparation) => void;
}

/**
 * Day counts outside [1, 14] are rejected before any planning starts.
 */
export function assertDayCount(days: number): void {
  if (!Number.isInteger(days) || days < MIN_PLAN_DAYS || days > MAX_PLAN_DAYS) {
    throw new InvalidInputError(`days must be between ${MIN_PLAN_DAYS} and ${MAX_PLAN_DAYS}`);
  }
}

function parsePlanDate(value: string): Date {
  const parsed = parseISO(value);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !isValid(parsed)) {
    throw new InvalidInputError(`start date must be YYYY-MM-DD, got "${value}"`);
  }
  return parsed;
}

export function planDateRange(today: string, dayCount: number): { startDate: string; endDate: string } {
  const start = parsePlanDate(today);
  return {
    startDate: format(start, "yyyy-MM-dd"),
    endDate: format(addDays(start, Math.max(dayCount, 1) - 1), "yyyy-MM-dd")
  };
}

export function generatedPlanTitle(store: string, dayCount: number): string {
  return `Generated Meal Plan (${store.toUpperCase()}, ${dayCount} days)`;
}

function toPlanItem(item: CatalogItem): PlanItemRef {
  return {
    id: item.id,
    name: item.name,
    price: item.price,
    categoryPath: item.categoryPath,
    imageUrl: item.imageUrl
  };
}

function planDay(date: string, buckets: CatalogBuckets, rng: SeededRandom): DayPlan {
  // Draw order is part of the reproducibility contract.
  const breakfast = rng.pick(buckets.snack);
  const lunchProtein = rng.pick(buckets.protein);
  const lunchVeg = rng.pick(buckets.vegetable);
  const dinnerProtein = rng.pick(buckets.protein);
  const dinnerCarb = rng.pick(buckets.carbohydrate);
  const dinnerVeg = rng.pick(buckets.vegetable);

  return {
    date,
    meals: [
      { name: "Breakfast", items: [toPlanItem(breakfast)] },
      { name: "Lunch", items: [toPlanItem(lunchProtein), toPlanItem(lunchVeg)] },
      { name: "Dinner", items: [toPlanItem(dinnerProtein), toPlanItem(dinnerCarb), toPlanItem(dinnerVeg)] }
    ]
  };
}

export function generateMealPlan(input: GenerateMealPlanInput): GeneratedPlanDocument {
  const { userId, store, dayCount, preferences, catalog, today, keywords } = input;
  if (catalog.length === 0) {
    throw new NoItemsForStoreError(store);
  }

  const start = parsePlanDate(today);
  const storeTag = store.toUpperCase();
  const allergies = normalizeAllergyTerms(preferences?.allergies);

  const filter = applyAllergyFilter(catalog, allergies);
  const { buckets, backfilled, unclassifiedCount } = bucketCatalog(filter.items, keywords);
  input.onPrepared?.({
    catalogSize: catalog.length,
    filteredSize: filter.items.length,
    excludedCount: filter.excludedCount,
    filterDiscarded: filter.filterDiscarded,
    backfilledBuckets: backfilled,
    unclassifiedCount
  });

  const rng = createSeededRandom(stableSeed([userId, storeTag, format(start, "yyyy-MM-dd"), dayCount]));

  const plan: DayPlan[] = [];
  for (let d = 0; d < dayCount; d++) {
    plan.push(planDay(format(addDays(start, d), "yyyy-MM-dd"), buckets, rng));
  }

  return {
    store: storeTag,
    days: dayCount,
    preferences: {
      dietaryRestrictions: preferences?.dietaryRestrictions ?? null,
      allergies,
      targetCaloriesPerDay: preferences?.targetCaloriesPerDay ?? null
    },
    plan
  };
}
