import { EmptyEvidenceError } from "../errors.js";
import type { RetrievalHit, TierNumber } from "../retrieval/types.js";

export interface FusionPolicy {
  budgetChars: number;
  maxHits: number;
}

export const DEFAULT_FUSION_POLICY: FusionPolicy = {
  budgetChars: 12000,
  maxHits: 12
};

export interface ContextEntry {
  referenceId: string;
  hit: RetrievalHit;
}

export interface FusedContext {
  entries: ContextEntry[];
  totalChars: number;
  budgetChars: number;
  droppedHitIds: string[];
}

export const passageKey = (hit: Pick<RetrievalHit, "documentId" | "sectionId">): string =>
  `${hit.documentId}::${hit.sectionId}`;

const compareDatesDescending = (left: string | null, right: string | null): number => {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return left < right ? 1 : -1;
};

/** Score desc, tier asc, effective date desc (undated last), id asc. */
export const compareHits = (left: RetrievalHit, right: RetrievalHit): number => {
  if (right.normalizedScore !== left.normalizedScore) {
    return right.normalizedScore - left.normalizedScore;
  }
  if (left.tier !== right.tier) {
    return left.tier - right.tier;
  }
  const byDate = compareDatesDescending(left.effectiveDate, right.effectiveDate);
  if (byDate !== 0) {
    return byDate;
  }
  if (left.id === right.id) {
    return 0;
  }
  return left.id < right.id ? -1 : 1;
};

const prefers = (candidate: RetrievalHit, incumbent: RetrievalHit): boolean =>
  candidate.tier !== incumbent.tier
    ? candidate.tier < incumbent.tier
    : compareHits(candidate, incumbent) < 0;

/**
 * Collapses hits that point at the same passage. The hit from the lowest tier
 * wins; the other tiers that found it are kept as corroboration.
 */
export const dedupeHits = (hits: readonly RetrievalHit[]): { kept: RetrievalHit[]; duplicateIds: string[] } => {
  const winners = new Map<string, RetrievalHit>();
  const tiersByKey = new Map<string, Set<TierNumber>>();
  const duplicateIds: string[] = [];

  for (const hit of hits) {
    const key = passageKey(hit);
    const tiers = tiersByKey.get(key) ?? new Set<TierNumber>();
    tiers.add(hit.tier);
    tiersByKey.set(key, tiers);

    const incumbent = winners.get(key);
    if (!incumbent) {
      winners.set(key, hit);
    } else if (prefers(hit, incumbent)) {
      duplicateIds.push(incumbent.id);
      winners.set(key, hit);
    } else {
      duplicateIds.push(hit.id);
    }
  }

  const kept = [...winners.entries()].map(([key, hit]) => {
    const corroboratingTiers = [...(tiersByKey.get(key) ?? [])]
      .filter((tier) => tier !== hit.tier)
      .sort((left, right) => left - right);
    return corroboratingTiers.length > 0 ? Object.freeze({ ...hit, corroboratingTiers }) : hit;
  });

  return { kept, duplicateIds };
};

export const assembleContext = (
  hits: readonly RetrievalHit[],
  policy: FusionPolicy = DEFAULT_FUSION_POLICY
): FusedContext => {
  const { kept, duplicateIds } = dedupeHits(hits);
  const ordered = [...kept].sort(compareHits);

  const selected: RetrievalHit[] = [];
  const droppedHitIds = [...duplicateIds];
  let totalChars = 0;

  for (const hit of ordered) {
    const size = hit.content.length;
    if (selected.length >= policy.maxHits || totalChars + size > policy.budgetChars) {
      droppedHitIds.push(hit.id);
      continue;
    }
    selected.push(hit);
    totalChars += size;
  }

  if (selected.length === 0) {
    throw new EmptyEvidenceError(hits.length);
  }

  return {
    entries: selected.map((hit, index) => ({ referenceId: `ref_${index + 1}`, hit })),
    totalChars,
    budgetChars: policy.budgetChars,
    droppedHitIds
  };
};
