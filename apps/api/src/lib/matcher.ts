import type { MatchResult, ServiceMatch, ServiceRecord } from "@civic-assist/shared";
import type { ServiceCatalog } from "./catalog.js";

export const DEFAULT_MATCH_LIMIT = 5;
export const MAX_MATCH_LIMIT = 20;

export type MatchWeights = {
  title: number;
  description: number;
  process: number;
  phraseBonus: number;
};

export const DEFAULT_MATCH_WEIGHTS: Readonly<MatchWeights> = Object.freeze({
  title: 3,
  description: 1,
  process: 1,
  phraseBonus: 2
});

const STOPWORDS = new Set([
  "a", "about", "an", "and", "any", "apply", "are", "at", "be", "can", "do", "does", "for", "from",
  "get", "how", "i", "in", "is", "it", "me", "my", "need", "of", "on", "or", "please", "the", "to",
  "want", "what", "when", "where", "which", "with", "you", "your"
]);

export type NormalizedQuery = {
  raw: string;
  normalized: string;
  tokens: string[];
};

export type MatchOptions = {
  limit?: number;
  weights?: MatchWeights;
};

export function resolveMatchLimit(value: number | undefined): number {
  if (value == null || !Number.isFinite(value)) {
    return DEFAULT_MATCH_LIMIT;
  }
  const parsed = Math.trunc(value);
  if (parsed <= 0) {
    return DEFAULT_MATCH_LIMIT;
  }
  return Math.min(parsed, MAX_MATCH_LIMIT);
}

// Letters, combining marks and digits of any script survive; everything else splits words.
export function normalizeText(value: string): string {
  return value
    .normalize("NFC")
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function stemToken(token: string): string {
  if (token.length > 3 && token.endsWith("s") && !token.endsWith("ss")) {
    return token.slice(0, -1);
  }
  return token;
}

function toTokenSet(value: string): Set<string> {
  const tokens = new Set<string>();
  for (const token of normalizeText(value).split(" ")) {
    if (token.length > 0) {
      tokens.add(stemToken(token));
    }
  }
  return tokens;
}

export function normalizeQuery(query: string): NormalizedQuery {
  const normalized = normalizeText(query);
  const uniqueTokens = new Set<string>();

  for (const token of normalized.split(" ")) {
    if (token.length > 0 && !STOPWORDS.has(token)) {
      uniqueTokens.add(stemToken(token));
    }
  }

  return {
    raw: query,
    normalized,
    tokens: [...uniqueTokens]
  };
}

export type RecordTokens = {
  title: ReadonlySet<string>;
  description: ReadonlySet<string>;
  process: ReadonlySet<string>;
  normalizedTitle: string;
};

// Catalog records are frozen, so their tokens are computed once and reused across questions.
const recordTokenCache = new WeakMap<ServiceRecord, RecordTokens>();

export function tokenizeServiceRecord(record: ServiceRecord): RecordTokens {
  const cached = recordTokenCache.get(record);
  if (cached) {
    return cached;
  }
  const tokens: RecordTokens = {
    title: toTokenSet(record.title),
    description: toTokenSet(record.description),
    process: toTokenSet(record.process),
    normalizedTitle: normalizeText(record.title)
  };
  recordTokenCache.set(record, tokens);
  return tokens;
}

function countHits(tokens: string[], fieldTokens: ReadonlySet<string>): number {
  return tokens.reduce((count, token) => (fieldTokens.has(token) ? count + 1 : count), 0);
}

export function scoreServiceRecord(query: NormalizedQuery, record: ServiceRecord, weights: MatchWeights): number {
  if (query.normalized.length === 0) {
    return 0;
  }

  const tokens = tokenizeServiceRecord(record);
  const titleHits = countHits(query.tokens, tokens.title);
  const descriptionHits = countHits(query.tokens, tokens.description);
  const processHits = countHits(query.tokens, tokens.process);
  const phraseMatch = tokens.normalizedTitle.includes(query.normalized);

  return (
    titleHits * weights.title +
    descriptionHits * weights.description +
    processHits * weights.process +
    (phraseMatch ? weights.phraseBonus : 0)
  );
}

/**
 * Ranks catalog records by token overlap with the question plus the title
 * phrase bonus, which still applies when every question word is a stopword.
 * Records scoring zero are dropped; equal scores keep catalog order.
 */
export function matchServices(question: string, catalog: ServiceCatalog, options: MatchOptions = {}): MatchResult {
  const limit = resolveMatchLimit(options.limit);
  const weights = options.weights ?? DEFAULT_MATCH_WEIGHTS;
  const query = normalizeQuery(question);

  if (query.normalized.length === 0) {
    return { matches: [] };
  }

  const scored: Array<ServiceMatch & { order: number }> = [];
  let order = 0;
  for (const record of catalog.all()) {
    const score = scoreServiceRecord(query, record, weights);
    if (score > 0) {
      scored.push({ record, score, order });
    }
    order += 1;
  }

  scored.sort((left, right) => right.score - left.score || left.order - right.order);

  return {
    matches: scored.slice(0, limit).map(({ record, score }) => ({ record, score }))
  };
}
