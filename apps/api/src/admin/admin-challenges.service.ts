import { BadRequestException, Injectable, NotFoundException } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import {
  challengeDifficultySchema,
  challengePointsSchema,
  isChallengeId,
  type ChallengeDifficulty,
  type ChallengeId
} from "@ctf-arena/types";
import type { Model } from "mongoose";
import { ChallengesService } from "../challenges/challenges.service";
import { normalizeSlug, toAdminChallenge, type AdminChallenge, type ChallengeRecord } from "../challenges/challenge.mapper";
import { ChallengeEntity } from "../challenges/challenge.schema";
import { VisitsService } from "../challenges/visits.service";
import { SubmissionsService } from "../submissions/submissions.service";

export interface CreateChallengeParams {
  slug: string;
  ruleId: string;
  title: string;
  category: string;
  description: string;
  flag: string;
  intro?: string | null;
  playInstructions?: string | null;
  frontendHint?: string | null;
  points?: number | null;
  difficulty?: string | null;
  isActive?: boolean | null;
}

export interface UpdateChallengeParams {
  id: string;
  ruleId?: string | null;
  title?: string | null;
  category?: string | null;
  description?: string | null;
  flag?: string | null;
  intro?: string | null;
  playInstructions?: string | null;
  frontendHint?: string | null;
  points?: number | null;
  difficulty?: string | null;
  isActive?: boolean | null;
}

export interface DeleteChallengeResult {
  id: string;
  deletedSubmissions: number;
  deletedVisits: number;
}

const DEFAULT_POINTS = 10;

const requireText = (value: string, label: string): string => {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new BadRequestException(`${label} cannot be empty.`);
  }
  return trimmed;
};

const optionalText = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

const parseRuleId = (value: string): ChallengeId => {
  const trimmed = value.trim();
  if (!isChallengeId(trimmed)) {
    throw new BadRequestException(`Unknown validation rule "${trimmed}".`);
  }
  return trimmed;
};

const parsePoints = (value: number): number => {
  const parsed = challengePointsSchema.safeParse(value);
  if (!parsed.success) {
    throw new BadRequestException("Points must be a whole number between 1 and 100.");
  }
  return parsed.data;
};

const parseDifficulty = (value: string): ChallengeDifficulty => {
  const parsed = challengeDifficultySchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new BadRequestException("Difficulty must be one of easy, medium or hard.");
  }
  return parsed.data;
};

@Injectable()
export class AdminChallengesService {
  constructor(
    @InjectModel(ChallengeEntity.name)
    private readonly challengeModel: Model<ChallengeEntity>,
    private readonly challengesService: ChallengesService,
    private readonly submissionsService: SubmissionsService,
    private readonly visitsService: VisitsService
  ) {}

  async listChallenges(): Promise<AdminChallenge[]> {
    const records = await this.challengesService.listAll();
    return records.map(toAdminChallenge);
  }

  async createChallenge(input: CreateChallengeParams): Promise<AdminChallenge> {
    const slug = normalizeSlug(input.slug);
    if (!slug) {
      throw new BadRequestException("A challenge slug must contain at least one alphanumeric character.");
    }

    const document = {
      slug,
      ruleId: parseRuleId(input.ruleId),
      title: requireText(input.title, "Title"),
      category: requireText(input.category, "Category").toLowerCase(),
      description: requireText(input.description, "Description"),
      flag: requireText(input.flag, "Flag"),
      intro: optionalText(input.intro),
      playInstructions: optionalText(input.playInstructions),
      frontendHint: optionalText(input.frontendHint),
      points: parsePoints(input.points ?? DEFAULT_POINTS),
      difficulty: parseDifficulty(input.difficulty ?? "easy"),
      isActive: input.isActive ?? true,
      solveCount: 0
    };

    const existing = await this.challengeModel.findOne({ slug }).lean<ChallengeRecord>().exec();
    if (existing) {
      throw new BadRequestException("A challenge with this slug already exists.");
    }

    const created = await this.challengeModel.create(document);
    return toAdminChallenge(created.toObject<ChallengeRecord>());
  }

  async updateChallenge(input: UpdateChallengeParams): Promise<AdminChallenge> {
    const slug = normalizeSlug(input.id);
    if (!slug) {
      throw new BadRequestException("A challenge slug must contain at least one alphanumeric character.");
    }

    const update: Partial<ChallengeEntity> = {};

    if (typeof input.ruleId === "string") {
      update.ruleId = parseRuleId(input.ruleId);
    }

    if (typeof input.title === "string") {
      update.title = requireText(input.title, "Title");
    }

    if (typeof input.category === "string") {
      update.category = requireText(input.category, "Category").toLowerCase();
    }

    if (typeof input.description === "string") {
      update.description = requireText(input.description, "Description");
    }

    if (typeof input.flag === "string") {
      update.flag = requireText(input.flag, "Flag");
    }

    if (input.intro !== undefined) {
      update.intro = optionalText(input.intro);
    }

    if (input.playInstructions !== undefined) {
      update.playInstructions = optionalText(input.playInstructions);
    }

    if (input.frontendHint !== undefined) {
      update.frontendHint = optionalText(input.frontendHint);
    }

    if (typeof input.points === "number") {
      update.points = parsePoints(input.points);
    }

    if (typeof input.difficulty === "string") {
      update.difficulty = parseDifficulty(input.difficulty);
    }

    if (typeof input.isActive === "boolean") {
      update.isActive = input.isActive;
    }

    const updated = await this.challengeModel
      .findOneAndUpdate({ slug }, { $set: update }, { new: true })
      .lean<ChallengeRecord>()
      .exec();

    if (!updated) {
      throw new NotFoundException("Challenge not found.");
    }

    return toAdminChallenge(updated);
  }

  /** Removes the challenge together with its submissions and visits. */
  async deleteChallenge(id: string): Promise<DeleteChallengeResult> {
    const slug = normalizeSlug(id);
    const deleted = await this.challengeModel.findOneAndDelete({ slug }).lean<ChallengeRecord>().exec();

    if (!deleted) {
      throw new NotFoundException("Challenge not found.");
    }

    const [deletedSubmissions, deletedVisits] = await Promise.all([
      this.submissionsService.deleteForChallenge(slug),
      this.visitsService.deleteForChallenge(slug)
    ]);

    return { id: slug, deletedSubmissions, deletedVisits };
  }
}
