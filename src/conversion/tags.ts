const TAG_DELIMITERS = /[,;\n]+/;

/**
 * Turns raw tag text into Anki tag tokens.
 *
 * Each raw string may hold several tags separated by commas, semicolons or
 * newlines. Whitespace inside a tag becomes a dash (`OSPF LSA` → `OSPF-LSA`).
 * Duplicates are detected case-insensitively; the first spelling seen wins
 * and the original order is kept.
 */
export function normalizeTags(rawTags: readonly string[]): string[] {
  const tokens: string[] = [];
  const seen = new Set<string>();

  for (const raw of rawTags) {
    for (const candidate of raw.split(TAG_DELIMITERS)) {
      const token = candidate.trim().replace(/\s+/g, '-');
      if (!token) continue;

      const key = token.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      tokens.push(token);
    }
  }

  return tokens;
}

/**
 * Joins tag tokens into the single string Anki expects in its Tags column.
 */
export function formatTags(tags: readonly string[], separator = ' '): string {
  return tags.join(separator);
}
