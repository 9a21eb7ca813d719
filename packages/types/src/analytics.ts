import { z } from "zod";

export const challengeVisitStatsSchema = z.object({
  challengeId: z.string(),
  challengeTitle: z.string(),
  totalVisits: z.number().int().nonnegative(),
  uniqueVisitors: z.number().int().nonnegative(),
  solveRate: z.number().nonnegative()
});

export const topScorerSchema = z.object({
  username: z.string(),
  score: z.number().int().nonnegative()
});

export const userAnalyticsSchema = z.object({
  totalUsers: z.number().int().nonnegative(),
  activeUsersToday: z.number().int().nonnegative(),
  activeUsersWeek: z.number().int().nonnegative(),
  newRegistrationsToday: z.number().int().nonnegative(),
  topScorers: z.array(topScorerSchema)
});

export const popularChallengeSchema = z.object({
  challengeId: z.string(),
  visitCount: z.number().int().nonnegative()
});

export const platformAnalyticsSchema = z.object({
  totalChallenges: z.number().int().nonnegative(),
  totalSubmissions: z.number().int().nonnegative(),
  totalVisits: z.number().int().nonnegative(),
  successRate: z.number().min(0).max(100),
  mostPopularChallenges: z.array(popularChallengeSchema)
});

export const pageVisitStatsSchema = z.object({
  totalVisits: z.number().int().nonnegative(),
  topPages: z.array(
    z.object({
      page: z.string(),
      visits: z.number().int().nonnegative()
    })
  )
});

export type ChallengeVisitStats = z.infer<typeof challengeVisitStatsSchema>;
export type TopScorer = z.infer<typeof topScorerSchema>;
export type UserAnalytics = z.infer<typeof userAnalyticsSchema>;
export type PopularChallenge = z.infer<typeof popularChallengeSchema>;
export type PlatformAnalytics = z.infer<typeof platformAnalyticsSchema>;
export type PageVisitStats = z.infer<typeof pageVisitStatsSchema>;
