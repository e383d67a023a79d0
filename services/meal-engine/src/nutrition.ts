/**
 * Nutrition totals for a plan.
 *
 * Per-serving facts are multiplied by how often each item appears and summed
 * per field. A field no item reports stays null, so "no data" never reads as zero.
 */

import { nutritionFieldKeys, type NutritionFact, type NutritionRow } from "@mealgen/contracts";
import { readPlanDocument } from "./plan-parser.js";
import { roundTo } from "./rounding.js";
import type { ItemCounts, NutritionTotals, PerDayNutrition } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNutrientValue(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim()) {
    // Text that is not a number ("n/a", "trace") counts as missing data, not 0.
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Stored facts look like `{ "parsed": { "calories": 120, ... } }`, as JSON
 * text or an object. Anything else decodes to null (treated as absent).
 */
export function decodeNutritionFact(raw: unknown): NutritionFact | null {
  const root = readPlanDocument(raw);
  if (!isRecord(root)) return null;
  const parsed = root.parsed;
  if (!isRecord(parsed)) return null;

  const fact: NutritionFact = {};
  for (const key of nutritionFieldKeys) {
    fact[key] = toNutrientValue(parsed[key]);
  }
  return fact;
}

export function indexNutritionRows(rows: readonly NutritionRow[]): Map<number, NutritionFact> {
  const facts = new Map<number, NutritionFact>();
  for (const row of rows) {
    if (facts.has(row.itemId)) continue;
    const fact = decodeNutritionFact(row.nutrition);
    if (fact) facts.set(row.itemId, fact);
  }
  return facts;
}

export function emptyNutritionTotals(): NutritionTotals {
  return {
    calories: null,
    protein_g: null,
    total_fat_g: null,
    total_carbohydrate_g: null,
    sodium_mg: null,
    dietary_fiber_g: null,
    total_sugars_g: null
  };
}

export function computeNutritionTotals(
  counts: ItemCounts,
  facts: ReadonlyMap<number, NutritionFact>
): NutritionTotals {
  const totals = emptyNutritionTotals();

  for (const [itemId, qty] of counts) {
    const fact = facts.get(itemId);
    if (!fact) continue;
    for (const key of nutritionFieldKeys) {
      const value = fact[key];
      if (value == null) continue;
      totals[key] = (totals[key] ?? 0) + value * qty;
    }
  }

  return totals;
}

/**
 * Divide each total by the plan's day count, rounded to 2 decimals.
 * Null totals and non-positive day counts give null.
 */
export function perDayAverages(totals: NutritionTotals, dayCount: number): PerDayNutrition {
  const average = (total: number | null): number | null =>
    total === null || dayCount <= 0 ? null : roundTo(total / dayCount, 2);

  return {
    caloriesPerDay: average(totals.calories),
    fatPerDay: average(totals.total_fat_g),
    proteinPerDay: average(totals.protein_g),
    carbohydratesPerDay: average(totals.total_carbohydrate_g),
    sodiumPerDay: average(totals.sodium_mg),
    fiberPerDay: average(totals.dietary_fiber_g),
    sugarPerDay: average(totals.total_sugars_g)
  };
}
