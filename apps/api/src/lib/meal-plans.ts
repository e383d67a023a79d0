import { format } from "date-fns";
import type {
  BucketKeywords,
  CreateMealPlanBody,
  MealPlanResponse,
  PreferenceSummary,
  ShoppingListResult
} from "@mealgen/contracts";
import {
  aggregateShoppingList,
  assertDayCount,
  generateMealPlan,
  generatedPlanTitle,
  planDateRange,
  requestGeneratedPlan,
  type CatalogLookup,
  type GenerationDelegate,
  type NutritionLookup
} from "@mealgen/meal-engine";
import { MealPlanNotFoundError } from "./api-error.js";
import type { MealPlanRecord, MealPlanRepository, PreferencesLookup } from "./repositories.js";

export const DEFAULT_PLAN_TITLE = "My Meal Plan";

const noPreferences: PreferenceSummary = {
  dietaryRestrictions: null,
  allergies: [],
  targetCaloriesPerDay: null
};

export type MealPlanServiceDeps = {
  catalog: CatalogLookup;
  nutrition: NutritionLookup;
  preferences: PreferencesLookup;
  plans: MealPlanRepository;
  delegate: GenerationDelegate;
  keywords: BucketKeywords;
  /** Current local date as YYYY-MM-DD. */
  today?: () => string;
};

export function toMealPlanResponse(record: MealPlanRecord): MealPlanResponse {
  return {
    id: record.id,
    title: record.title,
    startDate: record.startDate,
    endDate: record.endDate,
    planJson: record.planJson,
    createdAt: record.createdAt.toISOString()
  };
}

export class MealPlanService {
  private readonly today: () => string;

  constructor(private readonly deps: MealPlanServiceDeps) {
    this.today = deps.today ?? (() => format(new Date(), "yyyy-MM-dd"));
  }

  async list(userId: string): Promise<MealPlanResponse[]> {
    const records = await this.deps.plans.listByUser(userId);
    return records.map(toMealPlanResponse);
  }

  async get(userId: string, id: number): Promise<MealPlanResponse> {
    return toMealPlanResponse(await this.requireOwned(userId, id));
  }

  async create(userId: string, body: CreateMealPlanBody): Promise<MealPlanResponse> {
    const title = body.title?.trim() || DEFAULT_PLAN_TITLE;
    const record = await this.deps.plans.create({
      userId,
      title,
      startDate: body.startDate,
      endDate: body.endDate,
      planJson: typeof body.planJson === "string" ? body.planJson : JSON.stringify(body.planJson)
    });
    return toMealPlanResponse(record);
  }

  async remove(userId: string, id: number): Promise<void> {
    const deleted = await this.deps.plans.deleteOwned(id, userId);
    if (!deleted) throw new MealPlanNotFoundError(id);
  }

  /** Deterministic plan from the store catalog, saved for the caller. */
  async generate(userId: string, store: string, days: number): Promise<MealPlanResponse> {
    assertDayCount(days);
    const preferences = await this.deps.preferences.findByUserId(userId);
    const catalog = await this.deps.catalog.findByStore(store);
    const today = this.today();

    const document = generateMealPlan({
      userId,
      store,
      dayCount: days,
      preferences,
      catalog,
      today,
      keywords: this.deps.keywords,
      onPrepared: (summary) => {
        if (summary.filterDiscarded) {
          console.log("allergy filter discarded", { userId, store, catalogSize: summary.catalogSize });
        }
        if (summary.backfilledBuckets.length > 0) {
          console.log("meal buckets backfilled", { store, buckets: summary.backfilledBuckets });
        }
      }
    });

    const { startDate, endDate } = planDateRange(today, days);
    const record = await this.deps.plans.create({
      userId,
      title: generatedPlanTitle(store, days),
      startDate,
      endDate,
      planJson: JSON.stringify(document)
    });
    return toMealPlanResponse(record);
  }

  /** Plan from the external generation service, saved as returned. */
  async generateAi(userId: string, store: string, days: number): Promise<MealPlanResponse> {
    assertDayCount(days);
    const preferences = (await this.deps.preferences.findByUserId(userId)) ?? noPreferences;
    const result = await requestGeneratedPlan(this.deps.delegate, { userId, store, days, preferences });

    const record = await this.deps.plans.create({
      userId,
      title: result.title,
      startDate: result.startDate,
      endDate: result.endDate,
      planJson: result.planJson
    });
    return toMealPlanResponse(record);
  }

  async shoppingList(userId: string, id: number): Promise<ShoppingListResult> {
    const record = await this.requireOwned(userId, id);
    return aggregateShoppingList(
      { planId: record.id, document: record.planJson, startDate: record.startDate, endDate: record.endDate },
      { catalog: this.deps.catalog, nutrition: this.deps.nutrition }
    );
  }

  private async requireOwned(userId: string, id: number): Promise<MealPlanRecord> {
    const record = await this.deps.plans.findOwned(id, userId);
    if (!record) throw new MealPlanNotFoundError(id);
    return record;
  }
}
