export const MealPlanErrorCode = {
  INVALID_INPUT: "INVALID_INPUT",
  NO_ITEMS_FOR_STORE: "NO_ITEMS_FOR_STORE",
  GENERATION_FAILED: "GENERATION_FAILED"
} as const;

export type MealPlanErrorCodeType = (typeof MealPlanErrorCode)[keyof typeof MealPlanErrorCode];

/**
 * Failures that must reach the caller. Everything else (malformed plan
 * documents, missing catalog rows, missing nutrition) degrades to partial output.
 */
export class MealPlanError extends Error {
  readonly code: MealPlanErrorCodeType;

  constructor(code: MealPlanErrorCodeType, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends MealPlanError {
  constructor(message: string) {
    super(MealPlanErrorCode.INVALID_INPUT, message);
  }
}

export class NoItemsForStoreError extends MealPlanError {
  readonly store: string;

  constructor(store: string) {
    super(MealPlanErrorCode.NO_ITEMS_FOR_STORE, `No items found for store=${store}`);
    this.store = store;
  }
}

export class GenerationDelegateError extends MealPlanError {
  constructor(message: string, options?: ErrorOptions) {
    super(MealPlanErrorCode.GENERATION_FAILED, message, options);
  }
}
