import { differenceInCalendarDays, isBefore, isValid, parseISO } from "date-fns";
import { readDeclaredDayCount } from "./plan-parser.js";

export interface PlanDates {
  startDate?: string | null;
  endDate?: string | null;
}

function parseDate(value: string | null | undefined): Date | null {
  if (!value || !value.trim()) return null;
  const parsed = parseISO(value.trim());
  return isValid(parsed) ? parsed : null;
}

/**
 * Number of days the per-day nutrition averages divide by:
 * 1. inclusive span of the plan dates, when both parse and end >= start;
 * 2. else the document's integer `days` field;
 * 3. else 1.
 */
export function resolvePlanDayCount(dates: PlanDates, document: unknown): number {
  const start = parseDate(dates.startDate);
  const end = parseDate(dates.endDate);
  if (start && end && !isBefore(end, start)) {
    return differenceInCalendarDays(end, start) + 1;
  }

  const declared = readDeclaredDayCount(document);
  if (declared !== null) return declared;

  return 1;
}
