import fs from "node:fs";
import { z } from "zod";
import {
  bucketKeywordsSchema,
  catalogItemSchema,
  nutritionRowSchema,
  userPreferencesSchema,
  type BucketKeywords,
  type CatalogItem,
  type NutritionRow
} from "@mealgen/contracts";

export type SeedUserPreferences = z.infer<typeof userPreferencesSchema>;

function readSeedFile<S extends z.ZodTypeAny>(fileName: string, schema: S): z.infer<S> {
  const url = new URL(`./${fileName}`, import.meta.url);
  const parsed = schema.safeParse(JSON.parse(fs.readFileSync(url, "utf8")));
  if (!parsed.success) {
    throw new Error(`Seed file ${fileName} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

export const defaultBucketKeywords: BucketKeywords = readSeedFile("bucket-keywords.json", bucketKeywordsSchema);

export function loadSeedCatalog(): CatalogItem[] {
  return readSeedFile("catalog.json", z.array(catalogItemSchema));
}

export function loadSeedNutrition(): NutritionRow[] {
  return readSeedFile("nutrition.json", z.array(nutritionRowSchema));
}

export function loadSeedPreferences(): SeedUserPreferences[] {
  return readSeedFile("preferences.json", z.array(userPreferencesSchema));
}
