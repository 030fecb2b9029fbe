import type { ContextEntry, FusedContext } from "../fusion/context-assembler.js";
import type { RelationKind, RetrievalHit } from "../retrieval/types.js";
import { normalizeTitle } from "../shared/text.js";

export type ConflictKind = "contradiction_candidate" | "supersession" | "ambiguous_overlap";

export interface ConflictFinding {
  id: string;
  hitIds: [string, string];
  referenceIds: [string, string];
  kind: ConflictKind;
  description: string;
}

const points = (from: RetrievalHit, kind: RelationKind, to: RetrievalHit): boolean =>
  from.relationships.some((relationship) => relationship.kind === kind && relationship.targetId === to.documentId);

const linkedBy = (left: RetrievalHit, right: RetrievalHit, kind: RelationKind): [RetrievalHit, RetrievalHit] | null => {
  if (points(left, kind, right)) {
    return [left, right];
  }
  if (points(right, kind, left)) {
    return [right, left];
  }
  return null;
};

const describeVersion = (hit: RetrievalHit): string =>
  `${hit.documentId} (${hit.effectiveDate ?? "undated"} to ${hit.effectiveUntil ?? "present"})`;

const classifyPair = (left: RetrievalHit, right: RetrievalHit): { kind: ConflictKind; description: string } | null => {
  const supersession = linkedBy(left, right, "supersedes");
  if (supersession) {
    const [newer, older] = supersession;
    return {
      kind: "supersession",
      description: `"${newer.title}" (${newer.documentId}) supersedes "${older.title}" (${older.documentId}); the older text may no longer apply.`
    };
  }

  const amendment = linkedBy(left, right, "amends");
  if (amendment) {
    const [amending, amended] = amendment;
    return {
      kind: "contradiction_candidate",
      description: `"${amending.title}" (${amending.documentId}) amends "${amended.title}" (${amended.documentId}); their provisions may differ.`
    };
  }

  const sameProvision =
    normalizeTitle(left.title) === normalizeTitle(right.title) && left.sectionId === right.sectionId;
  const differentRanges =
    left.effectiveDate !== null &&
    right.effectiveDate !== null &&
    (left.effectiveDate !== right.effectiveDate || left.effectiveUntil !== right.effectiveUntil);
  if (sameProvision && differentRanges) {
    return {
      kind: "ambiguous_overlap",
      description: `Section ${left.sectionId} of "${left.title}" appears in two versions with different effective periods: ${describeVersion(left)} and ${describeVersion(right)}.`
    };
  }

  return null;
};

/**
 * Flags pairs of context passages from different documents that are linked by
 * supersession or amendment, or that are two dated versions of the same
 * provision. Only relationship and date metadata are consulted.
 */
export const detectConflicts = (context: Pick<FusedContext, "entries">): ConflictFinding[] => {
  const findings: ConflictFinding[] = [];
  const entries: ContextEntry[] = context.entries;

  for (let i = 0; i < entries.length; i += 1) {
    for (let j = i + 1; j < entries.length; j += 1) {
      const left = entries[i];
      const right = entries[j];
      if (left.hit.documentId === right.hit.documentId) {
        continue;
      }

      const classified = classifyPair(left.hit, right.hit);
      if (!classified) {
        continue;
      }

      findings.push({
        id: `conflict_${findings.length + 1}`,
        hitIds: [left.hit.id, right.hit.id],
        referenceIds: [left.referenceId, right.referenceId],
        kind: classified.kind,
        description: classified.description
      });
    }
  }

  return findings;
};
