/**
 * In-memory stores behind the lookup interfaces the engine reads through.
 * Catalog, nutrition and preferences are read-only snapshots seeded from
 * @mealgen/data; meal plans live for the lifetime of the process.
 */

import type { CatalogItem, NutritionRow, PreferenceSummary } from "@mealgen/contracts";
import { loadSeedCatalog, loadSeedNutrition, loadSeedPreferences } from "@mealgen/data";
import type { CatalogLookup, MaybePromise, NutritionLookup } from "@mealgen/meal-engine";

export interface PreferencesLookup {
  findByUserId(userId: string): MaybePromise<PreferenceSummary | null>;
}

export type MealPlanRecord = {
  id: number;
  userId: string;
  title: string;
  startDate: string | null;
  endDate: string | null;
  /** The plan document, stored verbatim. */
  planJson: string;
  createdAt: Date;
};

export type NewMealPlan = Omit<MealPlanRecord, "id" | "createdAt">;

export interface MealPlanRepository {
  /** Newest first. */
  listByUser(userId: string): MaybePromise<MealPlanRecord[]>;
  findOwned(id: number, userId: string): MaybePromise<MealPlanRecord | null>;
  create(plan: NewMealPlan): MaybePromise<MealPlanRecord>;
  /** False when no plan with that id belongs to the user. */
  deleteOwned(id: number, userId: string): MaybePromise<boolean>;
}

export class InMemoryCatalog implements CatalogLookup {
  constructor(private readonly items: readonly CatalogItem[]) {}

  findByStore(store: string): CatalogItem[] {
    const tag = store.trim().toUpperCase();
    return this.items.filter((item) => item.store.toUpperCase() === tag);
  }

  findByIds(ids: number[]): CatalogItem[] {
    const wanted = new Set(ids);
    return this.items.filter((item) => wanted.has(item.id));
  }
}

export class InMemoryNutrition implements NutritionLookup {
  constructor(private readonly rows: readonly NutritionRow[]) {}

  findByItemIds(ids: number[]): NutritionRow[] {
    const wanted = new Set(ids);
    return this.rows.filter((row) => wanted.has(row.itemId));
  }
}

export class InMemoryPreferences implements PreferencesLookup {
  private readonly byUser = new Map<string, PreferenceSummary>();

  constructor(entries: ReadonlyArray<PreferenceSummary & { userId: string }>) {
    for (const { userId, ...summary } of entries) {
      this.byUser.set(userId, summary);
    }
  }

  findByUserId(userId: string): PreferenceSummary | null {
    return this.byUser.get(userId) ?? null;
  }
}

export class InMemoryMealPlans implements MealPlanRepository {
  private readonly plans = new Map<number, MealPlanRecord>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  listByUser(userId: string): MealPlanRecord[] {
    return [...this.plans.values()]
      .filter((plan) => plan.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
  }

  findOwned(id: number, userId: string): MealPlanRecord | null {
    const plan = this.plans.get(id);
    return plan && plan.userId === userId ? plan : null;
  }

  create(plan: NewMealPlan): MealPlanRecord {
    const record: MealPlanRecord = { ...plan, id: this.nextId++, createdAt: this.now() };
    this.plans.set(record.id, record);
    return record;
  }

  deleteOwned(id: number, userId: string): boolean {
    if (!this.findOwned(id, userId)) return false;
    return this.plans.delete(id);
  }
}

export type Repositories = {
  catalog: InMemoryCatalog;
  nutrition: InMemoryNutrition;
  preferences: InMemoryPreferences;
  plans: InMemoryMealPlans;
};

export function createSeedRepositories(): Repositories {
  return {
    catalog: new InMemoryCatalog(loadSeedCatalog()),
    nutrition: new InMemoryNutrition(loadSeedNutrition()),
    preferences: new InMemoryPreferences(loadSeedPreferences()),
    plans: new InMemoryMealPlans(),
  };
}
