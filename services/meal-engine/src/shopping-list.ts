/**
 * Shopping List Aggregator
 *
 * Turns a stored plan document into a priced list with per-day nutrition.
 * Unknown items stay on the list as placeholders; missing prices and
 * nutrition only leave nulls behind.
 */

import type { CatalogItem, ShoppingListLine, ShoppingListResult } from "@mealgen/contracts";
import { resolvePlanDayCount, type PlanDates } from "./day-count.js";
import { computeNutritionTotals, emptyNutritionTotals, indexNutritionRows, perDayAverages } from "./nutrition.js";
import { extractItemCounts, readPlanDocument, readPlanStore } from "./plan-parser.js";
import type { CatalogLookup, ItemCounts, NutritionLookup } from "./types.js";

export const UNKNOWN_ITEM_NAME = "Unknown Item";

export interface ShoppingListSource extends PlanDates {
  planId: number;
  /** Parsed document or its JSON text. */
  document: unknown;
}

export interface ShoppingListLookups {
  catalog: Pick<CatalogLookup, "findByIds">;
  nutrition: NutritionLookup;
}

function compareNames(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/** Quantity descending, then name ignoring case (nulls last), then id. */
export function compareShoppingListLines(a: ShoppingListLine, b: ShoppingListLine): number {
  return b.qty - a.qty || compareNames(a.name, b.name) || a.id - b.id;
}

export function buildShoppingListLines(counts: ItemCounts, items: readonly CatalogItem[]): ShoppingListLine[] {
  const itemById = new Map<number, CatalogItem>();
  for (const item of items) {
    if (!itemById.has(item.id)) itemById.set(item.id, item);
  }

  const lines: ShoppingListLine[] = [];
  for (const [id, qty] of counts) {
    const item = itemById.get(id);
    if (!item) {
      lines.push({ id, name: UNKNOWN_ITEM_NAME, qty, price: null, unitSize: null, imageUrl: null, lineTotal: null });
      continue;
    }
    lines.push({
      id,
      name: item.name,
      qty,
      price: item.price,
      unitSize: item.unitSize,
      imageUrl: item.imageUrl,
      lineTotal: item.price === null ? null : item.price * qty
    });
  }

  return lines.sort(compareShoppingListLines);
}

export function estimateTotal(lines: readonly ShoppingListLine[]): number {
  return lines.reduce((sum, line) => sum + (line.lineTotal ?? 0), 0);
}

export function emptyShoppingList(planId: number, store: string | null): ShoppingListResult {
  return {
    mealplanId: planId,
    store,
    items: [],
    estimatedTotal: 0,
    ...perDayAverages(emptyNutritionTotals(), 1)
  };
}

export async function aggregateShoppingList(
  source: ShoppingListSource,
  lookups: ShoppingListLookups
): Promise<ShoppingListResult> {
  const document = readPlanDocument(source.document);
  const store = readPlanStore(document);
  const counts = extractItemCounts(document);
  if (counts.size === 0) {
    return emptyShoppingList(source.planId, store);
  }

  const ids = [...counts.keys()];
  const [items, nutritionRows] = await Promise.all([
    lookups.catalog.findByIds(ids),
    lookups.nutrition.findByItemIds(ids)
  ]);

  const lines = buildShoppingListLines(counts, items);
  const dayCount = resolvePlanDayCount(source, document);
  const totals = computeNutritionTotals(counts, indexNutritionRows(nutritionRows));

  return {
    mealplanId: source.planId,
    store,
    items: lines,
    estimatedTotal: estimateTotal(lines),
    ...perDayAverages(totals, dayCount)
  };
}
