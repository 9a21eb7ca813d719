import type { ChallengeSeed } from "@ctf-arena/types";
import type { Model } from "mongoose";
import type { ChallengeEntity } from "./challenge.schema";

export interface SeedSummary {
  inserted: number;
  total: number;
}

/**
 * Inserts catalogue entries whose slug is not stored yet. Existing challenges keep
 * whatever an admin changed on them.
 */
export const seedChallengeCatalogue = async (
  model: Model<ChallengeEntity>,
  seeds: ReadonlyArray<ChallengeSeed>
): Promise<SeedSummary> => {
  let inserted = 0;

  for (const seed of seeds) {
    const result = await model
      .updateOne(
        { slug: seed.slug },
        {
          $setOnInsert: {
            slug: seed.slug,
            ruleId: seed.id,
            title: seed.title,
            category: seed.category,
            description: seed.description,
            intro: seed.intro ?? null,
            playInstructions: seed.playInstructions ?? null,
            points: seed.points,
            difficulty: seed.difficulty,
            isActive: true,
            frontendHint: seed.frontendHint ?? null,
            flag: seed.flag,
            solveCount: 0
          }
        },
        { upsert: true }
      )
      .exec();

    inserted += result.upsertedCount;
  }

  return { inserted, total: seeds.length };
};
