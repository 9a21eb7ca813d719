import { Injectable } from "@nestjs/common";
import type { Leaderboard, PlayerProgress } from "@ctf-arena/types";
import { ChallengesService } from "../challenges/challenges.service";
import { SubmissionsService } from "../submissions/submissions.service";
import { UsersService } from "../users/users.service";

export const DEFAULT_LEADERBOARD_LIMIT = 50;
export const MAX_LEADERBOARD_LIMIT = 100;

const sanitizeLimit = (limit?: number): number => {
  if (typeof limit !== "number" || !Number.isFinite(limit)) {
    return DEFAULT_LEADERBOARD_LIMIT;
  }

  return Math.min(Math.max(Math.trunc(limit), 1), MAX_LEADERBOARD_LIMIT);
};

/** Share of active challenges solved, rounded to one decimal. */
export const progressPercentage = (solved: number, total: number): number =>
  total > 0 ? Math.round((solved / total) * 1000) / 10 : 0;

@Injectable()
export class LeaderboardService {
  constructor(
    private readonly usersService: UsersService,
    private readonly challengesService: ChallengesService,
    private readonly submissionsService: SubmissionsService
  ) {}

  async getLeaderboard(params: { limit?: number; viewerId?: string } = {}): Promise<Leaderboard> {
    const limit = sanitizeLimit(params.limit);

    const [players, totalPlayers, totalChallenges] = await Promise.all([
      this.usersService.rankedPlayers(limit),
      this.usersService.countActivePlayers(),
      this.challengesService.countActive()
    ]);

    const entries = players.map((player, index) => ({
      rank: index + 1,
      username: player.username,
      score: player.score,
      solvedChallenges: player.solvedChallenges.length,
      progressPercentage: progressPercentage(player.solvedChallenges.length, totalChallenges),
      isCurrentUser: params.viewerId !== undefined && player.userId === params.viewerId
    }));

    let viewerRank: number | null = null;
    if (params.viewerId) {
      const viewer = await this.usersService.findProfile(params.viewerId);
      if (viewer && viewer.status === "active") {
        viewerRank = await this.usersService.rankForScore(viewer.score);
      }
    }

    return { entries, totalPlayers, viewerRank };
  }

  async getProgress(userId: string): Promise<PlayerProgress> {
    const [profile, totalChallenges, recentSolves] = await Promise.all([
      this.usersService.findProfile(userId),
      this.challengesService.countActive(),
      this.submissionsService.recentSolves(userId)
    ]);

    const score = profile?.score ?? 0;
    const solved = profile?.solvedChallenges.length ?? 0;

    return {
      userId,
      totalChallenges,
      solvedChallenges: solved,
      totalScore: score,
      progressPercentage: progressPercentage(solved, totalChallenges),
      rank: await this.usersService.rankForScore(score),
      recentSolves
    };
  }
}
