/** Lower-cased alphanumeric tokens; apostrophes split words ("women's" → women, s). */
export const tokenize = (text: string): string[] => text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0);

export const tokenSet = (text: string): Set<string> => new Set(tokenize(text));

export const hasAnyToken = (tokens: ReadonlySet<string>, keywords: Iterable<string>): boolean => {
  for (const keyword of keywords) {
    if (tokens.has(keyword)) return true;
  }
  return false;
};

export const truncate = (value: string, max = 4000): string => (value.length > max ? `${value.slice(0, max)}...<truncated>` : value);
