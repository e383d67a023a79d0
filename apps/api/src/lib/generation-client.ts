import { generationResponseSchema, type GenerationRequest, type GenerationResult } from "@mealgen/contracts";
import { GenerationDelegateError, type GenerationDelegate } from "@mealgen/meal-engine";

export type GenerationClientOptions = {
  baseUrl: string;
  secret?: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

/** Wire body for `/generate`; the service reads allergies as one comma-separated string. */
export type GenerationPayload = Omit<GenerationRequest, "preferences"> & {
  preferences: Omit<GenerationRequest["preferences"], "allergies"> & { allergies: string | null };
};

export function toGenerationPayload(request: GenerationRequest): GenerationPayload {
  const { allergies, ...preferences } = request.preferences;
  return {
    ...request,
    preferences: { ...preferences, allergies: allergies.length > 0 ? allergies.join(", ") : null }
  };
}

/**
 * Client for the external plan generation service (`POST /generate`).
 * A 204 or a JSON `null` body means the service had nothing to offer.
 */
export function createGenerationClient(options: GenerationClientOptions): GenerationDelegate {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `${options.baseUrl.replace(/\/+$/, "")}/generate`;

  return {
    async generate(request: GenerationRequest): Promise<GenerationResult | null> {
      const headers: Record<string, string> = { "Content-Type": "application/json" };
      if (options.secret) headers["X-RAG-SECRET"] = options.secret;

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
      let body: unknown;
      try {
        const response = await fetchImpl(url, {
          method: "POST",
          headers,
          body: JSON.stringify(toGenerationPayload(request)),
          signal: controller.signal
        });
        if (!response.ok) {
          console.error("generation service error", { status: response.status, store: request.store, days: request.days });
          throw new GenerationDelegateError(`Generation service returned ${response.status}`);
        }
        body = response.status === 204 ? null : await response.json();
      } catch (error) {
        if (error instanceof GenerationDelegateError) throw error;
        const reason = controller.signal.aborted ? `timed out after ${options.timeoutMs}ms` : "request failed";
        console.error(`generation service ${reason}`, error);
        throw new GenerationDelegateError(`Generation service ${reason}`, { cause: error });
      } finally {
        clearTimeout(timeout);
      }

      if (body === null) return null;

      const parsed = generationResponseSchema.safeParse(body);
      if (!parsed.success) {
        console.error("generation service returned an invalid plan", parsed.error.flatten());
        throw new GenerationDelegateError("Generation service returned an invalid plan", { cause: parsed.error });
      }
      return parsed.data;
    }
  };
}
