/**
 * Canonical keys for entity identity. Exact key match is the primary resolution;
 * whole-token containment is the separate fallback (so "cd19" never matches "cd190").
 */

export function normalizeKey(name: string): string {
  return name
    .normalize("NFKC")
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s\-&/+]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

function tokens(key: string): string[] {
  return key.split(/[\s/]+/).filter((t) => t.length > 0);
}

/** True when `needle`'s tokens appear as a contiguous run inside `haystack`'s tokens. */
export function containsAsTokens(haystack: string, needle: string): boolean {
  const hay = tokens(normalizeKey(haystack));
  const nee = tokens(normalizeKey(needle));
  if (nee.length === 0 || nee.length > hay.length) return false;
  for (let start = 0; start + nee.length <= hay.length; start++) {
    let hit = true;
    for (let i = 0; i < nee.length; i++) {
      if (hay[start + i] !== nee[i]) {
        hit = false;
        break;
      }
    }
    if (hit) return true;
  }
  return false;
}

/** Capitalize the first letter of every alphabetic run ("mk-3475" -> "Mk-3475"). */
export function titleCase(name: string): string {
  return name
    .toLowerCase()
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}
