import { z } from "zod";
import { escapeRegExp } from "../../analysis/terminology.js";
import type { HitRelationship, RelationKind } from "../types.js";

export const SNIPPET_MAX_CHARS = 240;
const SNIPPET_LEAD_CHARS = 60;

const RELATION_KINDS: Record<string, RelationKind> = {
  supersedes: "supersedes",
  amends: "amends",
  references: "references",
  has_section: "has_section",
  implements: "implements"
};

export const toRelationKind = (value: string): RelationKind | null =>
  RELATION_KINDS[value.trim().toLowerCase()] ?? null;

export const identifierSchema = z.union([z.string().min(1), z.number()]).transform(String);

const relationshipRowSchema = z.object({
  kind: z.string(),
  target_id: identifierSchema
});

export const relationshipsSchema = z
  .array(relationshipRowSchema)
  .nullish()
  .transform((rows): HitRelationship[] =>
    (rows ?? []).flatMap((row) => {
      const kind = toRelationKind(row.kind);
      return kind ? [{ kind, targetId: row.target_id }] : [];
    })
  );

const formatDate = (value: Date): string | null =>
  Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);

export const dateColumnSchema = z
  .union([z.string(), z.date()])
  .nullish()
  .transform((value): string | null => {
    if (value === null || value === undefined) {
      return null;
    }
    if (value instanceof Date) {
      return formatDate(value);
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed.slice(0, 10) : null;
  });

export const optionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim().length > 0 ? value : null));

export const keywordCoverage = (content: string, terms: readonly string[]): number => {
  if (terms.length === 0) {
    return 0;
  }
  const haystack = content.toLowerCase();
  const found = terms.filter((term) => haystack.includes(term.toLowerCase())).length;
  return found / terms.length;
};

/**
 * Excerpt of `content` around the first matched term, with every term wrapped
 * in `**`. Falls back to the opening of the passage when nothing matches.
 */
export const buildSnippet = (content: string, terms: readonly string[], maxChars = SNIPPET_MAX_CHARS): string => {
  const flattened = content.replace(/\s+/g, " ").trim();
  const lower = flattened.toLowerCase();
  const positions = terms
    .map((term) => lower.indexOf(term.toLowerCase()))
    .filter((index) => index >= 0);
  const firstMatch = positions.length > 0 ? Math.min(...positions) : 0;
  const start = Math.max(0, firstMatch - SNIPPET_LEAD_CHARS);
  const end = Math.min(flattened.length, start + maxChars);

  let excerpt = flattened.slice(start, end);
  if (start > 0) {
    excerpt = `…${excerpt}`;
  }
  if (end < flattened.length) {
    excerpt = `${excerpt}…`;
  }

  const highlightable = [...new Set(terms.map((term) => term.toLowerCase()).filter((term) => term.length > 0))].sort(
    (left, right) => right.length - left.length
  );
  if (highlightable.length === 0) {
    return excerpt;
  }
  const pattern = new RegExp(`\\b(?:${highlightable.map(escapeRegExp).join("|")})\\b`, "gi");
  return excerpt.replace(pattern, (match) => `**${match}**`);
};
