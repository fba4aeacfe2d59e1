/**
 * Fold the titles the user already picked into the text that gets embedded,
 * so the neighbours lean toward those movies.
 */
export function buildAugmentedQuery(query: string, likedTitles: string[]): string {
  if (!likedTitles.length) return query;
  return `Movies similar to ${likedTitles.join(', ')}. Context: ${query}`;
}
