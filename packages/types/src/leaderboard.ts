import { z } from "zod";

export const leaderboardEntrySchema = z.object({
  rank: z.number().int().positive(),
  username: z.string(),
  score: z.number().int().nonnegative(),
  solvedChallenges: z.number().int().nonnegative(),
  progressPercentage: z.number().min(0).max(100),
  isCurrentUser: z.boolean()
});

export const leaderboardSchema = z.object({
  entries: z.array(leaderboardEntrySchema),
  totalPlayers: z.number().int().nonnegative(),
  viewerRank: z.number().int().positive().nullable()
});

export const recentSolveSchema = z.object({
  challengeId: z.string(),
  challengeTitle: z.string(),
  pointsEarned: z.number().int().nonnegative(),
  solvedAt: z.string()
});

export const playerProgressSchema = z.object({
  userId: z.string(),
  totalChallenges: z.number().int().nonnegative(),
  solvedChallenges: z.number().int().nonnegative(),
  totalScore: z.number().int().nonnegative(),
  progressPercentage: z.number().min(0).max(100),
  rank: z.number().int().positive(),
  recentSolves: z.array(recentSolveSchema)
});

export type LeaderboardEntry = z.infer<typeof leaderboardEntrySchema>;
export type Leaderboard = z.infer<typeof leaderboardSchema>;
export type RecentSolve = z.infer<typeof recentSolveSchema>;
export type PlayerProgress = z.infer<typeof playerProgressSchema>;
