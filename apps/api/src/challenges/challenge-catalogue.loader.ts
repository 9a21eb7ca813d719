import { challengeSeedListSchema, type ChallengeSeed } from "@ctf-arena/types";
import rawCatalogue from "./data/challenge-catalogue.json";

let cached: ReadonlyArray<ChallengeSeed> | null = null;

/** The bundled challenge definitions, validated on first use. */
export const loadChallengeSeeds = (): ReadonlyArray<ChallengeSeed> => {
  if (!cached) {
    cached = Object.freeze(challengeSeedListSchema.parse(rawCatalogue));
  }

  return cached;
};
