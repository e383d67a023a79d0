/**
 * Plan Parser
 *
 * Reads item references out of a plan document of unknown provenance.
 * Only day -> meals -> items[].id is relied on; anything else that is missing
 * or mistyped is skipped. Never throws.
 */

import type { ItemCounts } from "./types.js";

type PlanNode = Record<string, unknown>;

function isNode(value: unknown): value is PlanNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

function listField(node: unknown, key: string): unknown[] {
  const value = field(node, key);
  return Array.isArray(value) ? value : [];
}

/**
 * Accepts a parsed document or its JSON text. Unparsable text reads as null.
 */
export function readPlanDocument(input: unknown): unknown {
  if (typeof input !== "string") return input;
  if (!input.trim()) return null;
  try {
    return JSON.parse(input);
  } catch {
    return null;
  }
}

function dayNodes(document: unknown): unknown[] {
  const plan = field(document, "plan");
  if (Array.isArray(plan)) return plan;
  const days = field(document, "days");
  return Array.isArray(days) ? days : [];
}

/** Numeric ids are truncated to integers; anything else is not an id. */
export function toItemId(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  const id = Math.trunc(value);
  return Number.isSafeInteger(id) ? id : null;
}

export function extractItemCounts(input: unknown): ItemCounts {
  const document = readPlanDocument(input);
  const counts: ItemCounts = new Map();

  for (const day of dayNodes(document)) {
    for (const meal of listField(day, "meals")) {
      for (const item of listField(meal, "items")) {
        const id = toItemId(field(item, "id"));
        if (id === null) continue;
        counts.set(id, (counts.get(id) ?? 0) + 1);
      }
    }
  }

  return counts;
}

/** The document's own day count, when it is an integer. */
export function readDeclaredDayCount(input: unknown): number | null {
  const days = field(readPlanDocument(input), "days");
  return typeof days === "number" && Number.isInteger(days) ? days : null;
}

export function readPlanStore(input: unknown): string | null {
  const store = field(readPlanDocument(input), "store");
  return typeof store === "string" && store.trim() ? store.trim() : null;
}
