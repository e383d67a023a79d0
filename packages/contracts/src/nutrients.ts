/**
 * Per-serving nutrition fields carried by a stored nutrition fact.
 * Keys match the `parsed` object written next to each catalog item.
 */
export const nutritionFieldKeys = [
  "calories",
  "protein_g",
  "total_fat_g",
  "total_carbohydrate_g",
  "sodium_mg",
  "dietary_fiber_g",
  "total_sugars_g"
] as const;

export type NutritionFieldKey = (typeof nutritionFieldKeys)[number];

/** Shopping-list field that carries the per-day average of each nutrition field. */
export const perDayFieldByNutrient = {
  calories: "caloriesPerDay",
  protein_g: "proteinPerDay",
  total_fat_g: "fatPerDay",
  total_carbohydrate_g: "carbohydratesPerDay",
  sodium_mg: "sodiumPerDay",
  dietary_fiber_g: "fiberPerDay",
  total_sugars_g: "sugarPerDay"
} as const satisfies Record<NutritionFieldKey, string>;

export type PerDayField = (typeof perDayFieldByNutrient)[NutritionFieldKey];

export const MEAL_BUCKETS = ["protein", "vegetable", "carbohydrate", "snack"] as const;

export type MealBucket = (typeof MEAL_BUCKETS)[number];

export type ItemClassification = MealBucket | "unclassified";
