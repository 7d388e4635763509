import { similarityRatio } from "../utils/similarity.js";
import type { CategoryEntry } from "./types.js";

export const SIMILARITY_THRESHOLD = 0.6;
const SUBSTRING_SCORE = 0.7;
const SYNONYM_SCORE = 0.75;

const CATEGORY_SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  exhibition: ["show", "exhibit", "display", "gallery"],
  concert: ["show", "performance", "gig"],
  workshop: ["class", "training", "session"],
  conference: ["summit", "meeting", "convention"],
};

const LEADING_ARTICLES = ["the", "a", "an"];

function words(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((w) => w.length > 0));
}

export function nameVariants(name: string): string[] {
  const lower = name.toLowerCase();
  const variants = [lower, lower.endsWith("s") ? lower.slice(0, -1) : `${lower}s`];
  for (const article of LEADING_ARTICLES) {
    if (lower.startsWith(`${article} `)) {
      variants.push(lower.slice(article.length + 1));
    }
  }
  return variants;
}

function synonymScore(query: string, category: string): number {
  const queryWords = words(query);
  const categoryWords = words(category);
  const sharesWord = [...queryWords].some((w) => categoryWords.has(w));

  for (const [keyWord, synonyms] of Object.entries(CATEGORY_SYNONYMS)) {
    if (!category.includes(keyWord)) continue;
    if (synonyms.some((s) => queryWords.has(s)) && (sharesWord || queryWords.size === 1)) {
      return SYNONYM_SCORE;
    }
  }
  return 0;
}

export function scoreCategory(query: string, categoryName: string): number {
  const q = query.toLowerCase();
  const c = categoryName.toLowerCase();

  let score = similarityRatio(q, c);
  for (const variant of nameVariants(categoryName)) {
    score = Math.max(score, similarityRatio(q, variant));
  }
  if (c.includes(q) || q.includes(c)) {
    score = Math.max(score, SUBSTRING_SCORE);
  }
  return Math.max(score, synonymScore(q, c));
}

/** Best canonical category for a free-text phrase, or null below the threshold. */
export function findBestMatch(
  query: string,
  categories: readonly CategoryEntry[],
): string | null {
  if (query.trim().length === 0 || categories.length === 0) return null;

  let best: string | null = null;
  let bestScore = 0;
  for (const { canonicalName } of categories) {
    if (!canonicalName) continue;
    const score = scoreCategory(query, canonicalName);
    if (score > bestScore) {
      bestScore = score;
      best = canonicalName;
    }
  }
  return bestScore >= SIMILARITY_THRESHOLD ? best : null;
}

export function enrichQuery(query: string, categories: readonly CategoryEntry[]): string {
  const match = findBestMatch(query, categories);
  if (match && !query.toLowerCase().includes(match.toLowerCase())) {
    return `${query} (category: ${match})`;
  }
  return query;
}
