import { z } from "zod";

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Must be YYYY-MM-DD");

/** Blank strings read as "no date". */
const optionalIsoDateSchema = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? null : value),
  isoDateSchema.nullish().transform((value) => value ?? null)
);

// ============================================================================
// CATALOG & NUTRITION
// ============================================================================

export const catalogItemSchema = z.object({
  id: z.number().int().positive(),
  store: z.string().min(1),
  name: z.string().min(1),
  externalId: z.string().min(1),
  price: z.number().nonnegative().finite().nullable().default(null),
  unitSize: z.string().nullable().default(null),
  categoryPath: z.string().nullable().default(null),
  imageUrl: z.string().nullable().default(null)
});

export type CatalogItem = z.infer<typeof catalogItemSchema>;

const nutrientValueSchema = z.number().finite().nullable().optional();

export const nutritionFactSchema = z.object({
  calories: nutrientValueSchema,
  protein_g: nutrientValueSchema,
  total_fat_g: nutrientValueSchema,
  total_carbohydrate_g: nutrientValueSchema,
  sodium_mg: nutrientValueSchema,
  dietary_fiber_g: nutrientValueSchema,
  total_sugars_g: nutrientValueSchema
});

export type NutritionFact = z.infer<typeof nutritionFactSchema>;

/**
 * A stored nutrition row. `nutrition` is kept the way it was written:
 * JSON text or an object, usually wrapping the fields in `parsed`.
 */
export const nutritionRowSchema = z.object({
  itemId: z.number().int().positive(),
  nutrition: z.union([z.string(), z.record(z.unknown())]).nullable()
});

export type NutritionRow = z.infer<typeof nutritionRowSchema>;

// ============================================================================
// PREFERENCES & PLANNER CONFIGURATION
// ============================================================================

export const preferenceSummarySchema = z.object({
  dietaryRestrictions: z.string().nullable().default(null),
  allergies: z.array(z.string()).default([]),
  targetCaloriesPerDay: z.number().int().positive().nullable().default(null)
});

export type PreferenceSummary = z.infer<typeof preferenceSummarySchema>;

export const userPreferencesSchema = preferenceSummarySchema.extend({
  userId: z.string().min(1)
});

export const bucketKeywordsSchema = z.object({
  protein: z.array(z.string().min(1)).min(1),
  vegetable: z.array(z.string().min(1)).min(1),
  carbohydrate: z.array(z.string().min(1)).min(1),
  snack: z.array(z.string().min(1)).min(1)
});

export type BucketKeywords = z.infer<typeof bucketKeywordsSchema>;

// ============================================================================
// PLAN DOCUMENTS
// ============================================================================

export const planItemRefSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  price: z.number().nullable(),
  categoryPath: z.string().nullable(),
  imageUrl: z.string().nullable()
});

export const mealSchema = z.object({
  name: z.enum(["Breakfast", "Lunch", "Dinner"]),
  items: z.array(planItemRefSchema).min(1)
});

export const dayPlanSchema = z.object({
  date: isoDateSchema,
  meals: z.array(mealSchema)
});

/**
 * Shape written by the deterministic planner. Documents from other producers
 * are only guaranteed to follow day -> meals -> items[].id and are read
 * leniently instead of through this schema.
 */
export const generatedPlanDocumentSchema = z.object({
  store: z.string(),
  days: z.number().int().min(1).max(14),
  preferences: preferenceSummarySchema,
  plan: z.array(dayPlanSchema)
});

export type PlanItemRef = z.infer<typeof planItemRefSchema>;
export type Meal = z.infer<typeof mealSchema>;
export type DayPlan = z.infer<typeof dayPlanSchema>;
export type GeneratedPlanDocument = z.infer<typeof generatedPlanDocumentSchema>;

// ============================================================================
// GENERATION DELEGATE
// ============================================================================

export const generationRequestSchema = z.object({
  userId: z.string().min(1),
  store: z.string().min(1),
  days: z.number().int().min(1).max(14),
  preferences: preferenceSummarySchema
});

export type GenerationRequest = z.infer<typeof generationRequestSchema>;

export const generationResponseSchema = z.object({
  title: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim() ? value.trim() : "AI Meal Plan")),
  startDate: optionalIsoDateSchema,
  endDate: optionalIsoDateSchema,
  planJson: z
    .union([z.string().min(1), z.record(z.unknown())])
    .transform((value) => (typeof value === "string" ? value : JSON.stringify(value)))
});

export type GenerationResult = z.infer<typeof generationResponseSchema>;

// ============================================================================
// SHOPPING LIST
// ============================================================================

export const shoppingListLineSchema = z.object({
  id: z.number().int(),
  name: z.string().nullable(),
  qty: z.number().int().positive(),
  price: z.number().nullable(),
  unitSize: z.string().nullable(),
  imageUrl: z.string().nullable(),
  lineTotal: z.number().nullable()
});

export type ShoppingListLine = z.infer<typeof shoppingListLineSchema>;

export const shoppingListResultSchema = z.object({
  mealplanId: z.number().int().positive(),
  store: z.string().nullable(),
  items: z.array(shoppingListLineSchema),
  estimatedTotal: z.number(),
  caloriesPerDay: z.number().nullable(),
  fatPerDay: z.number().nullable(),
  proteinPerDay: z.number().nullable(),
  carbohydratesPerDay: z.number().nullable(),
  sodiumPerDay: z.number().nullable(),
  fiberPerDay: z.number().nullable(),
  sugarPerDay: z.number().nullable()
});

export type ShoppingListResult = z.infer<typeof shoppingListResultSchema>;

// ============================================================================
// MEAL PLAN RECORDS
// ============================================================================

export const mealPlanResponseSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  startDate: isoDateSchema.nullable(),
  endDate: isoDateSchema.nullable(),
  planJson: z.string(),
  createdAt: z.string()
});

export type MealPlanResponse = z.infer<typeof mealPlanResponseSchema>;

// ============================================================================
// REQUEST BODY SCHEMAS (for API input validation)
// ============================================================================

export const createMealPlanBodySchema = z.object({
  title: z.string().nullish(),
  startDate: optionalIsoDateSchema,
  endDate: optionalIsoDateSchema,
  planJson: z.union([z.string(), z.record(z.unknown())])
});

export type CreateMealPlanBody = z.infer<typeof createMealPlanBodySchema>;

export const generatePlanQuerySchema = z.object({
  store: z.string().trim().min(1).default("TRADER_JOES"),
  days: z.coerce
    .number()
    .int()
    .min(1, "days must be between 1 and 14")
    .max(14, "days must be between 1 and 14")
    .default(7)
});

export const mealPlanIdParamSchema = z.coerce.number().int().positive();
