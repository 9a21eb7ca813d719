import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { PageVisitStats } from "@ctf-arena/types";
import type { Model } from "mongoose";
import { VisitEntity } from "./visit.schema";

export interface VisitorInfo {
  userId?: string | null;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface ChallengeVisitCount {
  challengeId: string;
  totalVisits: number;
  uniqueVisitors: number;
}

const MAX_PAGE_LENGTH = 500;
const MAX_USER_AGENT_LENGTH = 512;
const TOP_PAGES_LIMIT = 10;

const toVisitFields = (visitor: VisitorInfo) => ({
  userId: visitor.userId ?? null,
  ipAddress: visitor.ipAddress?.trim() || "unknown",
  userAgent: (visitor.userAgent ?? "").slice(0, MAX_USER_AGENT_LENGTH)
});

@Injectable()
export class VisitsService {
  constructor(
    @InjectModel(VisitEntity.name)
    private readonly visitModel: Model<VisitEntity>
  ) {}

  async recordChallengeVisit(challengeId: string, visitor: VisitorInfo) {
    await this.visitModel.create({ challengeId, ...toVisitFields(visitor) });
  }

  /** Returns false when the page path is blank and nothing was stored. */
  async recordPageVisit(page: string, visitor: VisitorInfo): Promise<boolean> {
    const normalized = page.trim().slice(0, MAX_PAGE_LENGTH);
    if (!normalized) {
      return false;
    }

    await this.visitModel.create({ page: normalized, ...toVisitFields(visitor) });
    return true;
  }

  async countVisits(): Promise<number> {
    return this.visitModel.countDocuments({}).exec();
  }

  async countsByChallenge(): Promise<ChallengeVisitCount[]> {
    const rows = await this.visitModel
      .aggregate<{ _id: string; totalVisits: number; visitors: string[] }>([
        { $match: { challengeId: { $ne: null } } },
        {
          $group: {
            _id: "$challengeId",
            totalVisits: { $sum: 1 },
            visitors: { $addToSet: { $ifNull: ["$userId", "$ipAddress"] } }
          }
        },
        { $sort: { totalVisits: -1, _id: 1 } }
      ])
      .exec();

    return rows.map((row) => ({
      challengeId: row._id,
      totalVisits: row.totalVisits,
      uniqueVisitors: row.visitors.length
    }));
  }

  async pageVisitStats(): Promise<PageVisitStats> {
    const [totalVisits, topPages] = await Promise.all([
      this.visitModel.countDocuments({ page: { $ne: null } }).exec(),
      this.visitModel
        .aggregate<{ _id: string; visits: number }>([
          { $match: { page: { $ne: null } } },
          { $group: { _id: "$page", visits: { $sum: 1 } } },
          { $sort: { visits: -1, _id: 1 } },
          { $limit: TOP_PAGES_LIMIT }
        ])
        .exec()
    ]);

    return {
      totalVisits,
      topPages: topPages.map((row) => ({ page: row._id, visits: row.visits }))
    };
  }

  async deleteForChallenge(challengeId: string): Promise<number> {
    const result = await this.visitModel.deleteMany({ challengeId }).exec();
    return result.deletedCount;
  }
}
