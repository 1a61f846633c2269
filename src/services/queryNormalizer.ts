export type NormalizedQuery = {
  normalized: string;
  tokens: string[];
};

export const MAX_QUERY_TOKENS = 6;

export const QUERY_STOPWORDS: ReadonlySet<string> = new Set(["and", "or", "&", "the", "of", "a", "an"]);

// ASCII and CJK separators; "&" is kept so the stopword list can drop it.
const SEPARATOR_RE = /[\s,;|，；、｜：:。()（）[\]【】]+/gu;

export function normalizeQuery(raw: string, maxTokens: number = MAX_QUERY_TOKENS): NormalizedQuery {
  const normalized = String(raw ?? "")
    .toLowerCase()
    .replace(SEPARATOR_RE, " ")
    .trim();

  if (!normalized) {
    return { normalized: "", tokens: [] };
  }

  const tokens: string[] = [];
  for (const token of normalized.split(" ")) {
    if (!token || QUERY_STOPWORDS.has(token)) {
      continue;
    }
    tokens.push(token);
    if (tokens.length >= maxTokens) {
      break;
    }
  }

  return { normalized, tokens };
}

export function tokenizeQuery(raw: string): string[] {
  return normalizeQuery(raw).tokens;
}
