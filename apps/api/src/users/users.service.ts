import { Injectable, InternalServerErrorException, NotFoundException } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { TopScorer, UserAnalytics, UserRole } from "@ctf-arena/types";
import type { FilterQuery, Model } from "mongoose";
import type { AuthenticatedUser } from "../auth/auth.types";
import { UserEntity } from "./user.schema";

export type UserRecord = UserEntity & {
  createdAt: Date;
  updatedAt: Date;
};

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_SCORERS_LIMIT = 10;

const startOfUtcDay = (now: Date) =>
  new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));

/**
 * Player profiles keyed by the gateway's user id. Roles and status are written on
 * first sight only; afterwards the stored values are authoritative and the gateway
 * reads them back when it issues the next session.
 */
@Injectable()
export class UsersService {
  constructor(
    @InjectModel(UserEntity.name)
    private readonly userModel: Model<UserEntity>
  ) {}

  async ensureProfile(user: AuthenticatedUser, now: Date = new Date()): Promise<UserRecord> {
    const profile = await this.userModel
      .findOneAndUpdate(
        { userId: user.id },
        {
          $set: { email: user.email, username: user.username, lastSeenAt: now },
          $setOnInsert: { roles: user.roles, status: user.status, score: 0, solvedChallenges: [] }
        },
        { upsert: true, new: true }
      )
      .lean<UserRecord>()
      .exec();

    if (!profile) {
      throw new InternalServerErrorException("Player profile could not be loaded.");
    }

    return profile;
  }

  async findProfile(userId: string): Promise<UserRecord | null> {
    return this.userModel.findOne({ userId }).lean<UserRecord>().exec();
  }

  async solvedSet(userId: string | undefined): Promise<ReadonlySet<string> | undefined> {
    if (!userId) {
      return undefined;
    }

    const profile = await this.findProfile(userId);
    return new Set(profile?.solvedChallenges ?? []);
  }

  /**
   * Adds the challenge to the solved set and credits the points in one update.
   * Resolves false when the challenge was already recorded, so a racing duplicate
   * never scores twice.
   */
  async awardSolve(userId: string, challengeSlug: string, points: number): Promise<boolean> {
    const result = await this.userModel
      .updateOne(
        { userId, solvedChallenges: { $ne: challengeSlug } },
        { $addToSet: { solvedChallenges: challengeSlug }, $inc: { score: points } }
      )
      .exec();

    return result.modifiedCount > 0;
  }

  async listPlayers(): Promise<UserRecord[]> {
    return this.userModel.find({}).sort({ createdAt: -1 }).lean<UserRecord[]>().exec();
  }

  async updateRole(userId: string, role: UserRole): Promise<UserRecord> {
    const updated = await this.userModel
      .findOneAndUpdate({ userId }, { $set: { roles: [role] } }, { new: true })
      .lean<UserRecord>()
      .exec();

    if (!updated) {
      throw new NotFoundException("User not found.");
    }

    return updated;
  }

  async rankedPlayers(limit: number): Promise<UserRecord[]> {
    return this.userModel
      .find({ status: "active" })
      .sort({ score: -1, username: 1 })
      .limit(limit)
      .lean<UserRecord[]>()
      .exec();
  }

  async countActivePlayers(): Promise<number> {
    return this.userModel.countDocuments({ status: "active" }).exec();
  }

  /** 1-based rank: players with a strictly higher score, plus one. */
  async rankForScore(score: number): Promise<number> {
    const ahead = await this.userModel.countDocuments({ status: "active", score: { $gt: score } }).exec();
    return ahead + 1;
  }

  async analytics(now: Date = new Date()): Promise<UserAnalytics> {
    const today = startOfUtcDay(now);
    const weekAgo = new Date(now.getTime() - 7 * DAY_MS);
    const count = (filter: FilterQuery<UserEntity>) => this.userModel.countDocuments(filter).exec();

    const [totalUsers, activeUsersToday, activeUsersWeek, newRegistrationsToday, topScorers] = await Promise.all([
      count({}),
      count({ lastSeenAt: { $gte: today } }),
      count({ lastSeenAt: { $gte: weekAgo } }),
      count({ createdAt: { $gte: today } }),
      this.rankedPlayers(TOP_SCORERS_LIMIT)
    ]);

    return {
      totalUsers,
      activeUsersToday,
      activeUsersWeek,
      newRegistrationsToday,
      topScorers: topScorers.map((player): TopScorer => ({ username: player.username, score: player.score }))
    };
  }
}
