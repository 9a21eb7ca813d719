import { Field, Float, Int, ObjectType } from "@nestjs/graphql";

@ObjectType("RecentSolve")
export class RecentSolveModel {
  @Field(() => String)
  declare challengeId: string;

  @Field(() => String)
  declare challengeTitle: string;

  @Field(() => Int)
  declare pointsEarned: number;

  @Field(() => String)
  declare solvedAt: string;
}

@ObjectType("PlayerProgress")
export class PlayerProgressModel {
  @Field(() => String)
  declare userId: string;

  @Field(() => Int)
  declare totalChallenges: number;

  @Field(() => Int)
  declare solvedChallenges: number;

  @Field(() => Int)
  declare totalScore: number;

  @Field(() => Float)
  declare progressPercentage: number;

  @Field(() => Int)
  declare rank: number;

  @Field(() => [RecentSolveModel])
  declare recentSolves: RecentSolveModel[];
}
