export type KeywordMatcher = (text: string) => string[];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export type MatchMode = "word" | "substring";

function toPattern(keyword: string, match: MatchMode): RegExp {
  const body = escapeRegExp(keyword).replace(/\s+/g, "\\s+");
  if (match === "substring") return new RegExp(body, "i");

  // \b only holds next to a word character
  const lead = /^\w/.test(keyword) ? "\\b" : "";
  const trail = /\w$/.test(keyword) ? "s?\\b" : "";

  return new RegExp(`${lead}${body}${trail}`, "i");
}

/**
 * Case-insensitive keyword matcher. In "word" mode (the default) keywords match
 * whole words and tolerate a plural "s"; in "substring" mode they match anywhere
 * ("virus" in "Coronavirus").
 * Returns the matching keywords as configured, in configured order.
 */
export function createKeywordMatcher(
  keywords: readonly string[],
  { match = "word" }: { match?: MatchMode } = {}
): KeywordMatcher {
  const seen = new Set<string>();
  const patterns: { keyword: string; pattern: RegExp }[] = [];

  for (const raw of keywords) {
    const keyword = raw.trim();
    if (!keyword || seen.has(keyword.toLowerCase())) continue;

    seen.add(keyword.toLowerCase());
    patterns.push({ keyword, pattern: toPattern(keyword, match) });
  }

  return (text: string) =>
    patterns.filter(({ pattern }) => pattern.test(text)).map(({ keyword }) => keyword);
}
