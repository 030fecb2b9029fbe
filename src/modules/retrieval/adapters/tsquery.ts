/** Postgres text search configuration for a question language. */
export const textSearchConfig = (language: string): "english" | "french" => (language === "fr" ? "french" : "english");

const DISALLOWED_CHARACTERS = /[^\p{L}\p{N}_-]/gu;

const cleanTerm = (word: string): string => word.replace(DISALLOWED_CHARACTERS, "").replace(/^[-_]+|[-_]+$/g, "");

/**
 * Builds a `to_tsquery` expression from free text: stop words are dropped,
 * `A/B` becomes `(A | B)` and the remaining terms are joined with `&`.
 * Returns null when nothing searchable is left.
 */
export const buildTsQuery = (text: string, stopWords: ReadonlySet<string>): string | null => {
  const terms: string[] = [];

  for (const word of text.split(/\s+/)) {
    if (!word || stopWords.has(word.toLowerCase())) {
      continue;
    }

    if (word.includes("/")) {
      const variants = word
        .split("/")
        .map(cleanTerm)
        .filter((variant) => variant.length > 0 && !stopWords.has(variant.toLowerCase()));
      if (variants.length > 1) {
        terms.push(`(${variants.join(" | ")})`);
      } else if (variants.length === 1) {
        terms.push(variants[0]);
      }
      continue;
    }

    const cleaned = cleanTerm(word);
    if (cleaned && !stopWords.has(cleaned.toLowerCase())) {
      terms.push(cleaned);
    }
  }

  return terms.length > 0 ? terms.join(" & ") : null;
};

/** OR-joins several seed phrases; each multi-word phrase stays an `&` group. */
export const buildSeedTsQuery = (phrases: readonly string[], stopWords: ReadonlySet<string>): string | null => {
  const groups = new Set<string>();
  for (const phrase of phrases) {
    const expression = buildTsQuery(phrase, stopWords);
    if (!expression) {
      continue;
    }
    groups.add(expression.includes(" & ") ? `(${expression})` : expression);
  }
  return groups.size > 0 ? [...groups].join(" | ") : null;
};
