const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function tokenize(text: string): string[] {
  return [...new Set(tokenizeForBm25(text))];
}

/**
 * Lowercased word tokens. Identifiers split on underscores and camelCase
 * humps, so `customer_city` and `customerCity` both yield `customer`, `city`.
 */
export function tokenizeForBm25(text: string): string[] {
  const lower = splitCamelCase(text).toLowerCase();
  const words = lower.match(WORD_REGEX) ?? [];

  const expanded: string[] = [];
  for (const word of words) {
    expanded.push(...expandTokenVariants(word));
  }

  return expanded;
}

export function scoreByTokenOverlap(query: string, target: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) {
    return 0;
  }

  const targetTokens = new Set(tokenize(target));
  if (targetTokens.size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const token of queryTokens) {
    if (targetTokens.has(token)) {
      overlap += 1;
    }
  }

  const tokenScore = overlap / Math.sqrt(queryTokens.size * targetTokens.size);
  const ngramScore = scoreByCharNgramJaccard(query, target);

  return Math.max(tokenScore, ngramScore * 0.85);
}

export function isBroadQueryIntent(query: string): boolean {
  return /\b(overview|list|tables|schema|schemas|structure|summary|summarize|describe)\b/.test(
    query.toLowerCase(),
  );
}

function splitCamelCase(text: string): string {
  return text.replace(/(\p{Ll}|\p{N})(\p{Lu})/gu, "$1 $2");
}

function expandTokenVariants(token: string): string[] {
  const trimmed = token.trim();
  if (!trimmed) {
    return [];
  }

  const variants = new Set<string>();
  variants.add(trimmed);

  if (trimmed.length >= 4 && trimmed.endsWith("ies")) {
    variants.add(`${trimmed.slice(0, -3)}y`);
  } else if (trimmed.length >= 4 && trimmed.endsWith("s") && !trimmed.endsWith("ss")) {
    variants.add(trimmed.slice(0, -1));
  }

  return [...variants].filter((word) => word.length >= 2);
}

function scoreByCharNgramJaccard(query: string, target: string): number {
  const qNgrams = buildCharNgrams(query, 2);
  const tNgrams = buildCharNgrams(target.slice(0, 1200), 2);

  if (qNgrams.size === 0 || tNgrams.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const item of qNgrams) {
    if (tNgrams.has(item)) {
      intersection += 1;
    }
  }

  const union = qNgrams.size + tNgrams.size - intersection;
  if (union <= 0) {
    return 0;
  }
  return intersection / union;
}

function buildCharNgrams(input: string, n: number): Set<string> {
  const normalized = normalizeText(input)
    .toLowerCase()
    .replace(/\s+/g, "")
    .replace(/[^\p{L}\p{N}]/gu, "");

  if (normalized.length < n) {
    return new Set();
  }

  const grams = new Set<string>();
  for (let i = 0; i <= normalized.length - n; i += 1) {
    grams.add(normalized.slice(i, i + n));
  }
  return grams;
}
