/**
 * Splits operator input on commas, trimming each part and dropping the empty ones.
 * @param input Raw text such as "doc1, doc2,,doc3".
 * @returns The non-empty parts in input order; duplicates are kept.
 */
export function splitList(input: string): string[] {
  return input
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Resolves a selection against the ids that were listed to the operator.
 * "all" picks everything; otherwise 1-based positions, with out-of-range ones ignored.
 * Throws on a token that is not a whole number.
 */
export function selectIds(ids: string[], selection: string): string[] {
  const trimmed = selection.trim();
  if (trimmed.toLowerCase() === 'all') return [...ids];

  const positions = splitList(trimmed).map((token) => {
    if (!/^[+-]?\d+$/.test(token)) {
      throw new Error(`Invalid selection number: '${token}'`);
    }
    return Number.parseInt(token, 10);
  });

  return positions.filter((n) => n >= 1 && n <= ids.length).map((n) => ids[n - 1]);
}
