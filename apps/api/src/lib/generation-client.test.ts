import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import type { GenerationRequest } from "@mealgen/contracts";
import { GenerationDelegateError } from "@mealgen/meal-engine";
import { createGenerationClient, toGenerationPayload, type GenerationClientOptions } from "./generation-client.js";

// ── Helpers ──────────────────────────────────────────────────────────

const request: GenerationRequest = {
  userId: "demo-user",
  store: "TRADER_JOES",
  days: 3,
  preferences: { dietaryRestrictions: "vegetarian", allergies: ["peanut"], targetCaloriesPerDay: 1800 },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function makeClient(fetchImpl: typeof fetch, overrides: Partial<GenerationClientOptions> = {}) {
  return createGenerationClient({ baseUrl: "http://rag.test/", secret: "test-secret", timeoutMs: 1000, fetchImpl, ...overrides });
}

function sentBody(fetchImpl: Mock<typeof fetch>): unknown {
  const body = fetchImpl.mock.calls[0]?.[1]?.body;
  return typeof body === "string" ? JSON.parse(body) : undefined;
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ── Tests ────────────────────────────────────────────────────────────

describe("createGenerationClient", () => {
  it("posts the request with the shared secret and parses the reply", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ startDate: "2026-03-01", endDate: "2026-03-03", planJson: { plan: [] } }),
    );

    const result = await makeClient(fetchImpl).generate(request);

    expect(result).toEqual({
      title: "AI Meal Plan",
      startDate: "2026-03-01",
      endDate: "2026-03-03",
      planJson: '{"plan":[]}',
    });
    const call = fetchImpl.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("http://rag.test/generate");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "X-RAG-SECRET": "test-secret" });
    expect(sentBody(fetchImpl)).toEqual({
      userId: "demo-user",
      store: "TRADER_JOES",
      days: 3,
      preferences: { dietaryRestrictions: "vegetarian", allergies: "peanut", targetCaloriesPerDay: 1800 },
    });
  });

  it("leaves out the secret header when none is configured", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ planJson: "{}" }));
    await makeClient(fetchImpl, { secret: undefined }).generate(request);
    expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("sends allergy terms as one comma-separated string", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ planJson: "{}" }));
    const withAllergies = { ...request, preferences: { ...request.preferences, allergies: ["peanut", "shellfish"] } };
    await makeClient(fetchImpl).generate(withAllergies);
    expect(sentBody(fetchImpl)).toHaveProperty("preferences.allergies", "peanut, shellfish");
  });

  it("returns null for an empty reply", async () => {
    await expect(makeClient(vi.fn<typeof fetch>(async () => jsonResponse(null))).generate(request)).resolves.toBeNull();
    await expect(
      makeClient(vi.fn<typeof fetch>(async () => new Response(null, { status: 204 }))).generate(request),
    ).resolves.toBeNull();
  });

  it("fails on a non-2xx status", async () => {
    const client = makeClient(vi.fn<typeof fetch>(async () => jsonResponse({ detail: "overloaded" }, 503)));
    await expect(client.generate(request)).rejects.toThrow(
      new GenerationDelegateError("Generation service returned 503"),
    );
  });

  it("fails when the service cannot be reached", async () => {
    const cause = new TypeError("fetch failed");
    const client = makeClient(
      vi.fn<typeof fetch>(async () => {
        throw cause;
      }),
    );
    const error = await client.generate(request).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GenerationDelegateError);
    expect(error).toHaveProperty("message", "Generation service request failed");
    expect(error).toHaveProperty("cause", cause);
  });

  it("aborts after the timeout", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const client = makeClient(fetchImpl, { timeoutMs: 10 });
    await expect(client.generate(request)).rejects.toThrow("Generation service timed out after 10ms");
  });

  it("rejects a reply without a plan", async () => {
    const client = makeClient(vi.fn<typeof fetch>(async () => jsonResponse({ title: "Week" })));
    await expect(client.generate(request)).rejects.toThrow("Generation service returned an invalid plan");
  });
});

describe("toGenerationPayload", () => {
  it("sends no allergies as null", () => {
    const payload = toGenerationPayload({ ...request, preferences: { ...request.preferences, allergies: [] } });
    expect(payload.preferences.allergies).toBeNull();
  });
});
