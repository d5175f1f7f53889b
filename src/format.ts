import type { RankedMatch } from "./core/types.js";
import type { SearchOutcome } from "./core/impl/index.js";

export const NO_MATCHES = "No matches";

export function formatMatch(m: RankedMatch): string {
  return `Document ${m.docId} matching word ${m.term} with score ${m.score.toString()}`;
}

export function formatOutcome(outcome: SearchOutcome): string[] {
  if (outcome.status === "no-matches") return [NO_MATCHES];
  return outcome.results.map(formatMatch);
}
