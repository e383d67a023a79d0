import type { Response } from "express";
import { ZodError } from "zod";
import { MealPlanError, MealPlanErrorCode, type MealPlanErrorCodeType } from "@mealgen/meal-engine";

/**
 * Standardized API error codes.
 * Every error response from the API should include one of these codes.
 */
export const ErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_FOUND: "NOT_FOUND",
  BAD_REQUEST: "BAD_REQUEST",
  INTERNAL_ERROR: "INTERNAL_ERROR",
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  ...MealPlanErrorCode,
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorBody = { error: string; code: ErrorCodeType; details?: object };

export class MealPlanNotFoundError extends Error {
  readonly mealPlanId: number;

  constructor(mealPlanId: number) {
    super("Meal plan not found");
    this.name = "MealPlanNotFoundError";
    this.mealPlanId = mealPlanId;
  }
}

const statusByDomainCode: Record<MealPlanErrorCodeType, number> = {
  INVALID_INPUT: 400,
  NO_ITEMS_FOR_STORE: 404,
  GENERATION_FAILED: 502,
};

/**
 * Standard error response shape:
 *   { error: string, code: string, details?: object }
 */
export function sendError(
  res: Response,
  status: number,
  error: string,
  code: ErrorCodeType = ErrorCode.BAD_REQUEST,
  details?: object,
): void {
  const body: ErrorBody = { error, code };
  if (details) body.details = details;
  res.status(status).json(body);
}

export function send404(res: Response, entity: string): void {
  sendError(res, 404, `${entity} not found`, ErrorCode.NOT_FOUND);
}

export function send400(res: Response, message: string, details?: object): void {
  sendError(res, 400, message, ErrorCode.BAD_REQUEST, details);
}

/** Status and body for an error thrown while handling a request. */
export function errorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: { error: "Validation failed", code: ErrorCode.VALIDATION_FAILED, details: error.flatten() },
    };
  }
  if (error instanceof MealPlanNotFoundError) {
    return { status: 404, body: { error: error.message, code: ErrorCode.NOT_FOUND } };
  }
  if (error instanceof MealPlanError) {
    return { status: statusByDomainCode[error.code], body: { error: error.message, code: error.code } };
  }
  return { status: 500, body: { error: "Internal server error", code: ErrorCode.INTERNAL_ERROR } };
}

export function sendDomainError(res: Response, error: unknown): void {
  const { status, body } = errorResponse(error);
  if (status >= 500) {
    console.error("request failed", error);
  }
  res.status(status).json(body);
}
