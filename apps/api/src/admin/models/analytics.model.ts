import { Field, Float, Int, ObjectType } from "@nestjs/graphql";

@ObjectType("ChallengeVisitStats")
export class ChallengeVisitStatsModel {
  @Field(() => String)
  declare challengeId: string;

  @Field(() => String)
  declare challengeTitle: string;

  @Field(() => Int)
  declare totalVisits: number;

  @Field(() => Int)
  declare uniqueVisitors: number;

  @Field(() => Float)
  declare solveRate: number;
}

@ObjectType("TopScorer")
export class TopScorerModel {
  @Field(() => String)
  declare username: string;

  @Field(() => Int)
  declare score: number;
}

@ObjectType("UserAnalytics")
export class UserAnalyticsModel {
  @Field(() => Int)
  declare totalUsers: number;

  @Field(() => Int)
  declare activeUsersToday: number;

  @Field(() => Int)
  declare activeUsersWeek: number;

  @Field(() => Int)
  declare newRegistrationsToday: number;

  @Field(() => [TopScorerModel])
  declare topScorers: TopScorerModel[];
}

@ObjectType("PopularChallenge")
export class PopularChallengeModel {
  @Field(() => String)
  declare challengeId: string;

  @Field(() => Int)
  declare visitCount: number;
}

@ObjectType("PlatformAnalytics")
export class PlatformAnalyticsModel {
  @Field(() => Int)
  declare totalChallenges: number;

  @Field(() => Int)
  declare totalSubmissions: number;

  @Field(() => Int)
  declare totalVisits: number;

  @Field(() => Float, { description: "Correct submissions as a percentage of all submissions." })
  declare successRate: number;

  @Field(() => [PopularChallengeModel])
  declare mostPopularChallenges: PopularChallengeModel[];
}

@ObjectType("PageVisitCount")
export class PageVisitCountModel {
  @Field(() => String)
  declare page: string;

  @Field(() => Int)
  declare visits: number;
}

@ObjectType("PageVisitStats")
export class PageVisitStatsModel {
  @Field(() => Int)
  declare totalVisits: number;

  @Field(() => [PageVisitCountModel])
  declare topPages: PageVisitCountModel[];
}
