import { escapeRegExp, loadSynonyms, type SynonymDictionary } from "./terminology.js";
import type { Question } from "./types.js";

export const MAX_SYNONYMS_PER_TERM = 3;
export const MAX_EXPANSION_TERMS = 10;

const containsPhrase = (haystack: string, phrase: string): boolean =>
  new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(phrase)}($|[^\\p{L}\\p{N}])`, "u").test(haystack);

/**
 * Synonyms for the terms of a question, used to relax the Tier 2 keyword match.
 * Terms already in the question are never repeated.
 */
export const expandQuestionTerms = (
  question: Pick<Question, "normalized" | "keywords">,
  synonyms: SynonymDictionary = loadSynonyms()
): string[] => {
  const haystack = question.normalized.toLowerCase();
  const seen = new Set(question.keywords);
  const expansions: string[] = [];

  for (const [term, candidates] of Object.entries(synonyms)) {
    if (!containsPhrase(haystack, term)) {
      continue;
    }
    for (const candidate of candidates.slice(0, MAX_SYNONYMS_PER_TERM)) {
      const normalized = candidate.toLowerCase();
      if (seen.has(normalized) || containsPhrase(haystack, normalized)) {
        continue;
      }
      seen.add(normalized);
      expansions.push(normalized);
    }
  }

  return expansions.slice(0, MAX_EXPANSION_TERMS);
};
