import { CitationMismatchError } from "../errors.js";
import type { ContextEntry, FusedContext } from "../fusion/context-assembler.js";
import { normalizeSectionId, normalizeTitle } from "../shared/text.js";
import type { CitedSentence, Requirement, StructuredAnswer } from "../synthesis/types.js";

export type CollapseReason = "all_claims_removed" | "not_found_in_context";

export interface ValidationResult {
  answer: string;
  claims: CitedSentence[];
  requirements: Requirement[];
  removals: CitationMismatchError[];
  /** Surviving supported items over supported items checked; 0 when none were checked. */
  passRatio: number;
  citedReferenceIds: string[];
  limitations: string[];
  collapsed: CollapseReason | null;
}

const REFERENCE_ID_PATTERN = /^\[?\s*(ref_\d+)\s*\]?$/i;
const CITATION_TEXT_PATTERN = /^(.+?)(?:,\s*|\s+)(?:section|sec\.|s\.|article|art\.)\s*([\w.()-][\w.()\s-]*)$/i;

export const parseCitationText = (citation: string): { title: string; sectionId: string | null } => {
  const match = CITATION_TEXT_PATTERN.exec(citation.trim());
  if (match?.[1] && match[2]) {
    return { title: match[1], sectionId: match[2].trim() };
  }
  return { title: citation.trim(), sectionId: null };
};

/** Share of the context title's words a shortened citation title must cover. */
const MIN_TITLE_COVERAGE = 0.6;

const titleTokens = (title: string): string[] => normalizeTitle(title).split(" ").filter((token) => token.length > 0);

const containsPhrase = (tokens: readonly string[], phrase: readonly string[]): boolean => {
  for (let start = 0; start + phrase.length <= tokens.length; start += 1) {
    if (phrase.every((token, offset) => tokens[start + offset] === token)) {
      return true;
    }
  }
  return false;
};

/**
 * A cited title matches when it equals the entry's title, or is a whole-word
 * phrase of it covering most of the title's words.
 */
export const titleMatches = (cited: string, title: string): boolean => {
  const wanted = titleTokens(cited);
  const actual = titleTokens(title);
  if (wanted.length === 0 || actual.length === 0) {
    return false;
  }
  if (wanted.join(" ") === actual.join(" ")) {
    return true;
  }
  return wanted.length / actual.length >= MIN_TITLE_COVERAGE && containsPhrase(actual, wanted);
};

/**
 * Resolves a citation to a context entry, either by reference id or by
 * "Title, Section X" text. Text citations resolve only when exactly one entry
 * matches; ambiguous or unmatched citations return null.
 */
export const resolveCitation = (citation: string, entries: readonly ContextEntry[]): ContextEntry | null => {
  const referenceMatch = REFERENCE_ID_PATTERN.exec(citation.trim());
  if (referenceMatch?.[1]) {
    const referenceId = referenceMatch[1].toLowerCase();
    return entries.find((entry) => entry.referenceId === referenceId) ?? null;
  }

  const { title, sectionId } = parseCitationText(citation);
  const wantedSection = sectionId === null ? null : normalizeSectionId(sectionId);
  const matches = entries.filter(
    (entry) =>
      titleMatches(title, entry.hit.title) &&
      (wantedSection === null || normalizeSectionId(entry.hit.sectionId) === wantedSection)
  );
  return matches.length === 1 ? (matches[0] ?? null) : null;
};

interface CitationCheck {
  referenceIds: string[];
  unresolved: string[];
}

const checkCitations = (citations: readonly string[], entries: readonly ContextEntry[]): CitationCheck => {
  const referenceIds: string[] = [];
  const unresolved: string[] = [];
  for (const citation of citations) {
    const entry = resolveCitation(citation, entries);
    if (!entry) {
      unresolved.push(citation);
    } else if (!referenceIds.includes(entry.referenceId)) {
      referenceIds.push(entry.referenceId);
    }
  }
  return { referenceIds, unresolved };
};

const isGrounded = (check: CitationCheck): boolean => check.referenceIds.length > 0 && check.unresolved.length === 0;

const describeRemoval = (error: CitationMismatchError): string => `Removed unsupported statement "${error.claim}": ${error.message}`;

/**
 * Drops every supported claim or requirement whose citations do not all
 * resolve against the context. Surviving citations are rewritten to the
 * reference ids they resolved to.
 */
export const validateAnswer = (answer: StructuredAnswer, context: Pick<FusedContext, "entries">): ValidationResult => {
  const { entries } = context;
  const removals: CitationMismatchError[] = [];
  const cited = new Set<string>();
  let checked = 0;
  let passed = 0;

  const keepSentence = (item: CitedSentence): CitedSentence | null => {
    const check = checkCitations(item.citations, entries);
    if (item.status === "not_found") {
      check.referenceIds.forEach((referenceId) => cited.add(referenceId));
      return { ...item, citations: check.referenceIds };
    }
    checked += 1;
    if (!isGrounded(check)) {
      removals.push(new CitationMismatchError(item.sentence, check.unresolved));
      return null;
    }
    passed += 1;
    check.referenceIds.forEach((referenceId) => cited.add(referenceId));
    return { ...item, citations: check.referenceIds };
  };

  const directAnswer = keepSentence(answer.directAnswer);
  const claims = answer.claims.flatMap((claim) => {
    const kept = keepSentence(claim);
    return kept ? [kept] : [];
  });

  const requirements = answer.requirements.flatMap((requirement): Requirement[] => {
    checked += 1;
    const check = checkCitations(requirement.citations, entries);
    if (!isGrounded(check)) {
      removals.push(new CitationMismatchError(requirement.text, check.unresolved));
      return [];
    }
    passed += 1;
    check.referenceIds.forEach((referenceId) => cited.add(referenceId));
    return [{ text: requirement.text, citations: check.referenceIds }];
  });

  const supportedClaims = claims.filter((claim) => claim.status === "supported");
  const hasSupport =
    supportedClaims.length > 0 || requirements.length > 0 || directAnswer?.status === "supported";
  const limitations = [...answer.limitations, ...removals.map(describeRemoval)];

  let answerText: string;
  if (directAnswer) {
    answerText = directAnswer.sentence;
  } else if (supportedClaims.length > 0) {
    answerText = supportedClaims.map((claim) => claim.sentence).join(" ");
  } else {
    answerText = requirements.map((requirement) => requirement.text).join(" ");
  }

  return {
    answer: answerText,
    claims,
    requirements,
    removals,
    passRatio: checked === 0 ? 0 : passed / checked,
    citedReferenceIds: entries.map((entry) => entry.referenceId).filter((referenceId) => cited.has(referenceId)),
    limitations,
    collapsed: hasSupport ? null : removals.length > 0 ? "all_claims_removed" : "not_found_in_context"
  };
};
