/** Lowercased title with punctuation collapsed to single spaces, for loose title comparison. */
export const normalizeTitle = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();

export const normalizeSectionId = (sectionId: string): string => sectionId.toLowerCase().replace(/\s+/g, "");
