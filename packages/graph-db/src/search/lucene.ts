const LUCENE_SPECIAL_CHARS = /[+\-&|!(){}[\]^"~*?:\\/]/g;
const LUCENE_OPERATORS = /\b(AND|OR|NOT)\b/g;

/** Escape a free-text query for Neo4j's Lucene-backed full-text indexes. */
export function luceneSanitize(query: string): string {
  return query
    .replace(LUCENE_SPECIAL_CHARS, (char) => `\\${char}`)
    .replace(LUCENE_OPERATORS, (word) => word.toLowerCase());
}
