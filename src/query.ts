import { MIN_QUERY_LENGTH } from "./constants";
import type { NetworkProfile } from "./networks";

export type QueryResult =
  | { ok: true; query: string }
  | { ok: false; reason: "insufficient text"; length: number };

// astral code points only; lone surrogates stay, they are still <= U+FFFF
const NON_BMP = /[\u{10000}-\u{10FFFF}]/gu;

export function filterBmpCharacters(text: string): string {
  return text.replace(NON_BMP, "");
}

/**
 * Joins the network's site restriction and the caption into a search query.
 * Length is counted in UTF-16 code units after astral characters are gone,
 * so it equals the number of characters left in the query.
 */
export function buildQuery(rawText: string | undefined, network: NetworkProfile): QueryResult {
  const query = `${network.siteQuery}+${filterBmpCharacters(rawText ?? "")}`;
  if (query.length < MIN_QUERY_LENGTH) {
    return { ok: false, reason: "insufficient text", length: query.length };
  }
  return { ok: true, query };
}
