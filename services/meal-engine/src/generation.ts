import type { GenerationRequest, GenerationResult } from "@mealgen/contracts";
import { GenerationDelegateError } from "./errors.js";
import { assertDayCount } from "./planner.js";
import type { GenerationDelegate } from "./types.js";

/**
 * One blocking call to the external generation service. A null answer or a
 * failed call surfaces as GenerationDelegateError; there is no retry and no
 * fallback to the deterministic planner.
 */
export async function requestGeneratedPlan(
  delegate: GenerationDelegate,
  request: GenerationRequest
): Promise<GenerationResult> {
  assertDayCount(request.days);

  let result: GenerationResult | null;
  try {
    result = await delegate.generate(request);
  } catch (error) {
    if (error instanceof GenerationDelegateError) throw error;
    throw new GenerationDelegateError("Generation service request failed", { cause: error });
  }

  if (!result) {
    throw new GenerationDelegateError("Generation service returned no plan");
  }
  return result;
}
