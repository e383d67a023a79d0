import type {
  CatalogItem,
  GenerationRequest,
  GenerationResult,
  NutritionFieldKey,
  NutritionRow,
  PerDayField
} from "@mealgen/contracts";

export type MaybePromise<T> = T | Promise<T>;

/** Read-only access to a store's item catalog. */
export interface CatalogLookup {
  /** Items whose store tag matches, ignoring case. */
  findByStore(store: string): MaybePromise<CatalogItem[]>;
  findByIds(ids: number[]): MaybePromise<CatalogItem[]>;
}

export interface NutritionLookup {
  findByItemIds(ids: number[]): MaybePromise<NutritionRow[]>;
}

/**
 * External plan source (retrieval + text generation). Resolves to null when
 * the service produced nothing usable.
 */
export interface GenerationDelegate {
  generate(request: GenerationRequest): Promise<GenerationResult | null>;
}

/** item id -> number of times it is referenced across the plan */
export type ItemCounts = Map<number, number>;

export type NutritionTotals = Record<NutritionFieldKey, number | null>;

export type PerDayNutrition = Record<PerDayField, number | null>;
