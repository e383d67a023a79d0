import { describe, it, expect, vi } from "vitest";
import type { CatalogItem, NutritionRow, ShoppingListLine } from "@mealgen/contracts";
import {
  UNKNOWN_ITEM_NAME,
  aggregateShoppingList,
  buildShoppingListLines,
  compareShoppingListLines,
  type ShoppingListLookups,
} from "./shopping-list.js";

// ── Helpers ──────────────────────────────────────────────────────────

function makeItem(overrides: Partial<CatalogItem> = {}): CatalogItem {
  return {
    id: 1,
    store: "TRADER_JOES",
    name: "Test Item",
    externalId: "ext-1",
    price: 1,
    unitSize: null,
    categoryPath: null,
    imageUrl: null,
    ...overrides,
  };
}

function makeLine(overrides: Partial<ShoppingListLine> = {}): ShoppingListLine {
  return { id: 1, name: "Item", qty: 1, price: null, unitSize: null, imageUrl: null, lineTotal: null, ...overrides };
}

function makeLookups(items: CatalogItem[], rows: NutritionRow[] = []): ShoppingListLookups {
  return {
    catalog: {
      findByIds: (ids) => items.filter((item) => ids.includes(item.id)),
    },
    nutrition: {
      findByItemIds: async (ids) => rows.filter((row) => ids.includes(row.itemId)),
    },
  };
}

function day(date: string, ...meals: number[][]) {
  return { date, meals: meals.map((ids) => ({ name: "Meal", items: ids.map((id) => ({ id })) })) };
}

const catalog = [
  makeItem({ id: 1, name: "Chicken Breast", price: 5.0 }),
  makeItem({ id: 2, name: "Broccoli", price: 2.0 }),
  makeItem({ id: 3, name: "Granola Bar", price: 1.5 }),
];

const twoDayPlan = {
  store: "TRADER_JOES",
  days: 2,
  plan: [day("2026-03-01", [3], [1, 2], [1]), day("2026-03-02", [3], [1, 2])],
};

// ── aggregateShoppingList ────────────────────────────────────────────

describe("aggregateShoppingList", () => {
  it("prices and orders a two-day plan", async () => {
    const result = await aggregateShoppingList({ planId: 7, document: twoDayPlan }, makeLookups(catalog));

    expect(result.mealplanId).toBe(7);
    expect(result.store).toBe("TRADER_JOES");
    expect(result.items.map((l) => [l.id, l.qty, l.lineTotal])).toEqual([
      [1, 3, 15],
      [2, 2, 4],
      [3, 2, 3],
    ]);
    expect(result.estimatedTotal).toBe(22);
    expect(result.caloriesPerDay).toBeNull();
  });

  it("keeps unresolved ids as placeholder lines", async () => {
    const document = { plan: [day("2026-03-01", [1, 99])] };
    const result = await aggregateShoppingList({ planId: 1, document }, makeLookups(catalog));

    expect(result.items).toContainEqual({
      id: 99,
      name: UNKNOWN_ITEM_NAME,
      qty: 1,
      price: null,
      unitSize: null,
      imageUrl: null,
      lineTotal: null,
    });
    expect(result.estimatedTotal).toBe(5);
    expect(result.store).toBeNull();
  });

  it("leaves the total untouched by items without a price", async () => {
    const items = [makeItem({ id: 1, price: 4 }), makeItem({ id: 2, name: "Seasoning", price: null })];
    const document = { plan: [day("2026-03-01", [1, 2, 2])] };
    const result = await aggregateShoppingList({ planId: 1, document }, makeLookups(items));

    expect(result.items[0]).toMatchObject({ id: 2, qty: 2, lineTotal: null });
    expect(result.estimatedTotal).toBe(4);
  });

  it("averages nutrition over the plan dates", async () => {
    const rows: NutritionRow[] = [
      { itemId: 1, nutrition: '{"parsed":{"calories":165,"protein_g":31}}' },
      { itemId: 2, nutrition: { parsed: { calories: 30, dietary_fiber_g: "2.5" } } },
    ];
    const result = await aggregateShoppingList(
      { planId: 1, document: JSON.stringify(twoDayPlan), startDate: "2026-03-01", endDate: "2026-03-02" },
      makeLookups(catalog, rows),
    );

    expect(result.caloriesPerDay).toBe(277.5);
    expect(result.proteinPerDay).toBe(46.5);
    expect(result.fiberPerDay).toBe(2.5);
    expect(result.sodiumPerDay).toBeNull();
  });

  it("uses the declared day count when the plan has no dates", async () => {
    const rows: NutritionRow[] = [{ itemId: 3, nutrition: { parsed: { calories: 190 } } }];
    const result = await aggregateShoppingList({ planId: 1, document: twoDayPlan }, makeLookups(catalog, rows));
    expect(result.caloriesPerDay).toBe(190);
  });

  it("returns an empty list without querying when the plan has no items", async () => {
    const findByIds = vi.fn(() => []);
    const findByItemIds = vi.fn(() => []);
    const result = await aggregateShoppingList(
      { planId: 3, document: "not json" },
      { catalog: { findByIds }, nutrition: { findByItemIds } },
    );

    expect(result).toEqual({
      mealplanId: 3,
      store: null,
      items: [],
      estimatedTotal: 0,
      caloriesPerDay: null,
      fatPerDay: null,
      proteinPerDay: null,
      carbohydratesPerDay: null,
      sodiumPerDay: null,
      fiberPerDay: null,
      sugarPerDay: null,
    });
    expect(findByIds).not.toHaveBeenCalled();
    expect(findByItemIds).not.toHaveBeenCalled();
  });

  it("gives the same result on repeated runs", async () => {
    const lookups = makeLookups(catalog);
    const first = await aggregateShoppingList({ planId: 7, document: twoDayPlan }, lookups);
    const second = await aggregateShoppingList({ planId: 7, document: twoDayPlan }, lookups);
    expect(second).toEqual(first);
  });
});

// ── Line building and ordering ───────────────────────────────────────

describe("buildShoppingListLines", () => {
  it("uses the first catalog row for a duplicated id", () => {
    const lines = buildShoppingListLines(new Map([[1, 2]]), [
      makeItem({ id: 1, name: "First", price: 2 }),
      makeItem({ id: 1, name: "Second", price: 9 }),
    ]);
    expect(lines).toEqual([makeLine({ id: 1, name: "First", qty: 2, price: 2, lineTotal: 4 })]);
  });
});

describe("compareShoppingListLines", () => {
  it("orders by quantity, then name ignoring case with nulls last, then id", () => {
    const lines = [
      makeLine({ id: 5, name: null, qty: 2 }),
      makeLine({ id: 4, name: "banana", qty: 2 }),
      makeLine({ id: 3, name: "Apple", qty: 2 }),
      makeLine({ id: 2, name: "apple", qty: 2 }),
      makeLine({ id: 1, name: "Zucchini", qty: 4 }),
    ];
    expect(lines.sort(compareShoppingListLines).map((l) => l.id)).toEqual([1, 2, 3, 4, 5]);
  });
});
