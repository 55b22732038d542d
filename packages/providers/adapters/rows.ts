import { MalformedEnvelope } from "@core/errors";
import type { NormalizedRow, ServiceDescriptor } from "../types";

/**
 * Validates raw rows against the descriptor's schema. One bad row fails the
 * whole envelope; partial data is never returned.
 */
export function parseRows(descriptor: ServiceDescriptor, candidates: readonly unknown[]): NormalizedRow[] {
  return candidates.map((candidate, index) => {
    const parsed = descriptor.parseRow(candidate);
    if (!parsed.ok) {
      throw new MalformedEnvelope(`${descriptor.resource}: row ${index} does not match its schema`, {
        index,
        issues: parsed.issues,
      });
    }
    return parsed.row;
  });
}
