/**
 * CANONICAL DESTINATIONS
 *
 * Ordered keyword table used by the preference extractor.
 * Order matters: it decides ties during disambiguation.
 */

export interface CanonicalDestination {
  name: string;
  keywords: readonly string[];
}

export const DEFAULT_DESTINATIONS: readonly CanonicalDestination[] = [
  { name: "work", keywords: ["work", "office", "workplace", "company"] },
  { name: "home", keywords: ["home", "house", "apartment", "residence"] },
  {
    name: "jaypee institute of information technology sec 62 noida",
    keywords: ["jaypee", "jiit", "sec 62", "sector 62", "noida"],
  },
  {
    name: "jaypee institute of information technology sec 128 jaypee wishtown noida",
    keywords: ["jaypee", "jiit", "sec 128", "sector 128", "wishtown", "noida"],
  },
];

/**
 * A keyword that pins down one destination among look-alikes:
 * a long all-digit token, or a sector reference.
 */
export function isSpecificKeyword(keyword: string): boolean {
  return (keyword.length > 3 && /^\d+$/.test(keyword)) || keyword.includes("sec");
}

export interface DestinationMatch {
  name: string;
  hits: number;
}

/**
 * Resolve free text to a canonical destination, or null when nothing matches.
 */
export function matchDestination(
  text: string,
  table: readonly CanonicalDestination[] = DEFAULT_DESTINATIONS
): { name: string; candidates: DestinationMatch[] } | null {
  const lower = text.toLowerCase();

  const candidates: DestinationMatch[] = [];
  for (const entry of table) {
    const hits = entry.keywords.filter((kw) => lower.includes(kw)).length;
    if (hits > 0) {
      candidates.push({ name: entry.name, hits });
    }
  }

  if (candidates.length === 0) return null;
  if (candidates.length === 1) return { name: candidates[0].name, candidates };

  // Several destinations share generic keywords; a specific hit wins
  for (const entry of table) {
    if (!candidates.some((c) => c.name === entry.name)) continue;
    const specificHit = entry.keywords.some((kw) => isSpecificKeyword(kw) && lower.includes(kw));
    if (specificHit) return { name: entry.name, candidates };
  }

  // Strict > keeps the earliest entry on equal counts
  let best = candidates[0];
  for (const candidate of candidates.slice(1)) {
    if (candidate.hits > best.hits) best = candidate;
  }
  return { name: best.name, candidates };
}
