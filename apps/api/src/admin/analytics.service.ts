import { Injectable } from "@nestjs/common";
import type { ChallengeVisitStats, PageVisitStats, PlatformAnalytics, UserAnalytics } from "@ctf-arena/types";
import { ChallengesService } from "../challenges/challenges.service";
import { VisitsService } from "../challenges/visits.service";
import { SubmissionsService } from "../submissions/submissions.service";
import { UsersService } from "../users/users.service";

const POPULAR_CHALLENGES_LIMIT = 5;

const percentage = (part: number, whole: number): number =>
  whole > 0 ? Math.round((part / whole) * 1000) / 10 : 0;

@Injectable()
export class AnalyticsService {
  constructor(
    private readonly challengesService: ChallengesService,
    private readonly visitsService: VisitsService,
    private readonly submissionsService: SubmissionsService,
    private readonly usersService: UsersService
  ) {}

  /** Per challenge, busiest first. Solve rate is solves per hundred visits. */
  async challengeVisitStats(): Promise<ChallengeVisitStats[]> {
    const [challenges, counts] = await Promise.all([
      this.challengesService.listAll(),
      this.visitsService.countsByChallenge()
    ]);

    const countsBySlug = new Map(counts.map((count) => [count.challengeId, count]));

    return challenges
      .map((challenge) => {
        const count = countsBySlug.get(challenge.slug);
        const totalVisits = count?.totalVisits ?? 0;

        return {
          challengeId: challenge.slug,
          challengeTitle: challenge.title,
          totalVisits,
          uniqueVisitors: count?.uniqueVisitors ?? 0,
          solveRate: percentage(challenge.solveCount ?? 0, totalVisits)
        };
      })
      .sort((a, b) => b.totalVisits - a.totalVisits || a.challengeId.localeCompare(b.challengeId));
  }

  async userAnalytics(now?: Date): Promise<UserAnalytics> {
    return this.usersService.analytics(now);
  }

  async platformAnalytics(): Promise<PlatformAnalytics> {
    const [totalChallenges, submissions, totalVisits, visitCounts] = await Promise.all([
      this.challengesService.countActive(),
      this.submissionsService.counts(),
      this.visitsService.countVisits(),
      this.visitsService.countsByChallenge()
    ]);

    return {
      totalChallenges,
      totalSubmissions: submissions.total,
      totalVisits,
      successRate: percentage(submissions.correct, submissions.total),
      mostPopularChallenges: visitCounts
        .slice(0, POPULAR_CHALLENGES_LIMIT)
        .map((count) => ({ challengeId: count.challengeId, visitCount: count.totalVisits }))
    };
  }

  async pageVisitStats(): Promise<PageVisitStats> {
    return this.visitsService.pageVisitStats();
  }
}
