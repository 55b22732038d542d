/**
 * Typed reads of NormalizedRow fields for consumers outside the adapters.
 * A missing or differently-typed field reads as the fallback.
 */

import type { NormalizedRow } from "./types";

export function rowString(row: NormalizedRow, field: string, fallback = ""): string {
  const value = row[field];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return fallback;
}

export function rowOptionalString(row: NormalizedRow, field: string): string | null {
  const value = row[field];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function rowNumber(row: NormalizedRow, field: string, fallback = 0): number {
  const value = row[field];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number(value);
    return value.trim().length > 0 && Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

export function rowBoolean(row: NormalizedRow, field: string): boolean {
  return row[field] === true;
}
