import "reflect-metadata";
import { existsSync } from "node:fs";
import { resolve } from "node:path";

import { config as loadEnv } from "dotenv";
import mongoose from "mongoose";

import { resolveMongoUri } from "../src/arena.config";
import { loadChallengeSeeds } from "../src/challenges/challenge-catalogue.loader";
import { ChallengeEntity, ChallengeSchema } from "../src/challenges/challenge.schema";
import { seedChallengeCatalogue } from "../src/challenges/challenge-seeder";
import { apiLogger } from "../src/observability/logger";

/**
 * Inserts the bundled challenge catalogue into MongoDB. Challenges that already
 * exist are left untouched.
 */
async function seedDatabase() {
  bootstrapEnv();

  const uri = resolveMongoUri();

  // Same schema the API registers, so seeded documents match runtime expectations.
  const ChallengeModel = mongoose.model<ChallengeEntity>(ChallengeEntity.name, ChallengeSchema);

  const connection = await mongoose.connect(uri);

  try {
    await ChallengeModel.createIndexes();
    return await seedChallengeCatalogue(ChallengeModel, loadChallengeSeeds());
  } finally {
    await connection.connection.close();
  }
}

/**
 * Loads local environment overrides before connecting to MongoDB.
 */
function bootstrapEnv() {
  const cwd = process.cwd();
  const envCandidates = [".env.seed", ".env.local", ".env"].map((file) => resolve(cwd, file));

  for (const path of envCandidates) {
    if (existsSync(path)) {
      loadEnv({ path, override: false });
    }
  }
}

seedDatabase()
  .then((summary) => {
    apiLogger.info({ event: "catalogue.seeded", ...summary }, "Challenge catalogue seeded");
  })
  .catch((error: unknown) => {
    apiLogger.error({ event: "catalogue.seed_failed", err: error }, "Challenge catalogue seeding failed");
    process.exitCode = 1;
  });
