import type { RawHit, RetrievalHit, TierNumber } from "./types.js";

export type CalibrationRule = { kind: "clamp" } | { kind: "saturating"; halfPoint: number };

export type CalibrationPolicy = Record<TierNumber, CalibrationRule>;

export const DEFAULT_CALIBRATION: CalibrationPolicy = {
  1: { kind: "clamp" },
  2: { kind: "clamp" },
  3: { kind: "saturating", halfPoint: 0.1 },
  4: { kind: "saturating", halfPoint: 0.1 }
};

/** Maps a backend score into [0, 1]. Monotonic in `raw`; non-finite or negative input maps to 0. */
export const calibrateScore = (raw: number, rule: CalibrationRule): number => {
  if (!Number.isFinite(raw) || raw <= 0) {
    return 0;
  }
  if (rule.kind === "clamp") {
    return Math.min(1, raw);
  }
  return raw / (raw + rule.halfPoint);
};

export const calibrateHits = (hits: readonly RawHit[], tier: TierNumber, rule: CalibrationRule): RetrievalHit[] =>
  hits.map((hit) =>
    Object.freeze({
      ...hit,
      tier,
      normalizedScore: calibrateScore(hit.rawScore, rule),
      citation: { documentTitle: hit.title, sectionId: hit.sectionId },
      corroboratingTiers: []
    })
  );
