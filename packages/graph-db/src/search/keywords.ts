const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "in", "is", "it",
  "of", "on", "or", "that", "the", "to", "was", "were", "what", "when", "where",
  "which", "who", "with",
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 1 && !STOPWORDS.has(token));
}

/**
 * Rank items by how many distinct query terms their text contains. Items with
 * no matching term are left out; ties keep input order.
 */
export function keywordRank<T>(query: string, items: readonly T[], textOf: (item: T) => string): T[] {
  const terms = new Set(tokenize(query));
  if (terms.size === 0) return [];

  return items
    .map((item, index) => {
      const tokens = new Set(tokenize(textOf(item)));
      let score = 0;
      for (const term of terms) {
        if (tokens.has(term)) score++;
      }
      return { item, index, score };
    })
    .filter(({ score }) => score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ item }) => item);
}
