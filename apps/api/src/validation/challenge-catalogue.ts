import type { ChallengeCatalogue, ChallengeCatalogueEntry, ChallengeId } from "@ctf-arena/types";

/**
 * Freezes catalogue entries into the read-only map the dispatcher consumes.
 * A later entry for the same id replaces an earlier one.
 */
export const createChallengeCatalogue = (entries: Iterable<ChallengeCatalogueEntry>): ChallengeCatalogue => {
  const catalogue = new Map<ChallengeId, Readonly<ChallengeCatalogueEntry>>();

  for (const entry of entries) {
    catalogue.set(entry.id, Object.freeze({ id: entry.id, points: entry.points, flag: entry.flag }));
  }

  return catalogue;
};
