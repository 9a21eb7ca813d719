import { Injectable, type OnModuleInit } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import {
  challengeDifficultySchema,
  type Challenge,
  type ChallengeDifficulty,
  type ChallengeSummary,
  type ListChallengesParams
} from "@ctf-arena/types";
import type { FilterQuery, Model } from "mongoose";
import { ArenaConfigService } from "../arena.config";
import { apiLogger } from "../observability/logger";
import { loadChallengeSeeds } from "./challenge-catalogue.loader";
import { compareByRule, toChallenge, toChallengeSummary, type ChallengeRecord } from "./challenge.mapper";
import { ChallengeEntity } from "./challenge.schema";
import { seedChallengeCatalogue, type SeedSummary } from "./challenge-seeder";

export const CHALLENGE_DIFFICULTIES: ReadonlyArray<ChallengeDifficulty> = challengeDifficultySchema.options;

@Injectable()
export class ChallengesService implements OnModuleInit {
  constructor(
    @InjectModel(ChallengeEntity.name)
    private readonly challengeModel: Model<ChallengeEntity>,
    private readonly config: ArenaConfigService
  ) {}

  async onModuleInit() {
    if (!this.config.shouldSeedChallenges()) {
      return;
    }

    await this.seedCatalogue();
  }

  async seedCatalogue(): Promise<SeedSummary> {
    const summary = await seedChallengeCatalogue(this.challengeModel, loadChallengeSeeds());
    apiLogger.info({ event: "catalogue.seeded", ...summary }, "Challenge catalogue seeded");
    return summary;
  }

  async listChallenges(params: ListChallengesParams = {}, solved?: ReadonlySet<string>): Promise<ChallengeSummary[]> {
    const filter: FilterQuery<ChallengeEntity> = { isActive: true };

    const category = params.category?.trim();
    if (category) {
      filter.category = category;
    }

    const difficulty = challengeDifficultySchema.safeParse(params.difficulty?.trim().toLowerCase());
    if (difficulty.success) {
      filter.difficulty = difficulty.data;
    }

    const records = await this.challengeModel.find(filter).lean<ChallengeRecord[]>().exec();

    return records.sort(compareByRule).map((record) => toChallengeSummary(record, solved));
  }

  async getChallenge(slug: string, solved?: ReadonlySet<string>): Promise<Challenge | null> {
    const record = await this.findActive(slug);
    return record ? toChallenge(record, solved) : null;
  }

  /** Active challenge as stored, flag included. Never hand this to a resolver. */
  async findActive(slug: string): Promise<ChallengeRecord | null> {
    return this.challengeModel.findOne({ slug: slug.trim().toLowerCase(), isActive: true }).lean<ChallengeRecord>().exec();
  }

  /** Every stored challenge, inactive ones included, newest first. */
  async listAll(): Promise<ChallengeRecord[]> {
    return this.challengeModel.find({}).sort({ createdAt: -1 }).lean<ChallengeRecord[]>().exec();
  }

  async listCategories(): Promise<string[]> {
    const categories = await this.challengeModel.distinct("category", { isActive: true }).exec();

    return categories.filter((value): value is string => typeof value === "string").sort();
  }

  listDifficulties(): ChallengeDifficulty[] {
    return [...CHALLENGE_DIFFICULTIES];
  }

  async countActive(): Promise<number> {
    return this.challengeModel.countDocuments({ isActive: true }).exec();
  }

  async recordSolve(slug: string) {
    await this.challengeModel.updateOne({ slug }, { $inc: { solveCount: 1 } }).exec();
  }

  async findTitles(slugs: ReadonlyArray<string>): Promise<Map<string, string>> {
    if (slugs.length === 0) {
      return new Map();
    }

    const records = await this.challengeModel
      .find({ slug: { $in: [...slugs] } })
      .lean<ChallengeRecord[]>()
      .exec();

    return new Map(records.map((record) => [record.slug, record.title]));
  }
}
