import { describe, it, expect, vi } from "vitest";
import type { GenerationRequest, GenerationResult } from "@mealgen/contracts";
import { GenerationDelegateError, InvalidInputError } from "./errors.js";
import { requestGeneratedPlan } from "./generation.js";
import type { GenerationDelegate } from "./types.js";

const request: GenerationRequest = {
  userId: "demo-user",
  store: "TRADER_JOES",
  days: 3,
  preferences: { dietaryRestrictions: null, allergies: [], targetCaloriesPerDay: null },
};

const result: GenerationResult = {
  title: "AI Meal Plan",
  startDate: "2026-03-01",
  endDate: "2026-03-03",
  planJson: '{"plan":[]}',
};

function makeDelegate(generate: GenerationDelegate["generate"]): GenerationDelegate {
  return { generate: vi.fn(generate) };
}

describe("requestGeneratedPlan", () => {
  it("returns the delegate's result", async () => {
    const delegate = makeDelegate(async () => result);
    await expect(requestGeneratedPlan(delegate, request)).resolves.toEqual(result);
    expect(delegate.generate).toHaveBeenCalledWith(request);
  });

  it("treats an empty answer as a failure", async () => {
    const delegate = makeDelegate(async () => null);
    await expect(requestGeneratedPlan(delegate, request)).rejects.toThrow(GenerationDelegateError);
  });

  it("wraps a failed call and keeps the cause", async () => {
    const cause = new Error("connection refused");
    const delegate = makeDelegate(async () => {
      throw cause;
    });
    const error = await requestGeneratedPlan(delegate, request).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GenerationDelegateError);
    expect(error).toHaveProperty("cause", cause);
    expect(error).toHaveProperty("code", "GENERATION_FAILED");
  });

  it("rethrows a delegate error unchanged", async () => {
    const delegateError = new GenerationDelegateError("Generation service returned 503");
    const delegate = makeDelegate(async () => {
      throw delegateError;
    });
    await expect(requestGeneratedPlan(delegate, request)).rejects.toBe(delegateError);
  });

  it("rejects an out-of-range day count before calling the delegate", async () => {
    const delegate = makeDelegate(async () => result);
    await expect(requestGeneratedPlan(delegate, { ...request, days: 15 })).rejects.toThrow(InvalidInputError);
    expect(delegate.generate).not.toHaveBeenCalled();
  });
});
