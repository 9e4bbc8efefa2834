import { DEFAULT_ESTIMATED_VALUE } from "./schema.js";

export type BudgetPattern = "range" | "single" | "hourly";

export interface BudgetEstimate {
  value: number;
  /** Rule that produced `value`; null when the default was used. */
  pattern: BudgetPattern | null;
}

/** Full-time hours in a week; hourly rates are scaled to one week of work. */
export const HOURS_PER_WEEK = 40;

const HOURLY_SUFFIX = String.raw`(?:\/\s*(?:hr|hour)\b|per\s+hour\b)`;

const RANGE_PATTERN = /\$\s?(\d[\d,]*)\s*-\s*\$?\s?(\d[\d,]*)/;
const SINGLE_PATTERN = new RegExp(
  String.raw`\$\s?(\d[\d,]*)(?![\d,])(?!\s*${HOURLY_SUFFIX})`,
  "i"
);
const HOURLY_PATTERN = new RegExp(String.raw`\$\s?(\d[\d,]*)\s*${HOURLY_SUFFIX}`, "i");

function toAmount(raw: string | undefined): number | null {
  if (!raw) return null;
  const amount = Number.parseInt(raw.replace(/,/g, ""), 10);
  if (Number.isNaN(amount)) return null;
  return clamp(amount);
}

function clamp(value: number): number {
  return Math.min(Math.max(Math.floor(value), 0), Number.MAX_SAFE_INTEGER);
}

/**
 * Best-effort money inference from free text. Rules are tried in order
 * (range, single amount, hourly rate) and the first match wins.
 */
export function extractBudgetDetailed(text: string): BudgetEstimate {
  const range = RANGE_PATTERN.exec(text);
  if (range) {
    const low = toAmount(range[1]);
    const high = toAmount(range[2]);
    if (low !== null && high !== null) {
      return { value: clamp((low + high) / 2), pattern: "range" };
    }
  }

  const single = SINGLE_PATTERN.exec(text);
  if (single) {
    const amount = toAmount(single[1]);
    if (amount !== null) {
      return { value: amount, pattern: "single" };
    }
  }

  const hourly = HOURLY_PATTERN.exec(text);
  if (hourly) {
    const rate = toAmount(hourly[1]);
    if (rate !== null) {
      return { value: clamp(rate * HOURS_PER_WEEK), pattern: "hourly" };
    }
  }

  return { value: DEFAULT_ESTIMATED_VALUE, pattern: null };
}

export function extractBudget(text: string): number {
  return extractBudgetDetailed(text).value;
}
