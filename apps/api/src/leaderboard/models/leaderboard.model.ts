import { Field, Float, Int, ObjectType } from "@nestjs/graphql";

@ObjectType("LeaderboardEntry")
export class LeaderboardEntryModel {
  @Field(() => Int)
  declare rank: number;

  @Field(() => String)
  declare username: string;

  @Field(() => Int)
  declare score: number;

  @Field(() => Int)
  declare solvedChallenges: number;

  @Field(() => Float)
  declare progressPercentage: number;

  @Field(() => Boolean)
  declare isCurrentUser: boolean;
}

@ObjectType("Leaderboard")
export class LeaderboardModel {
  @Field(() => [LeaderboardEntryModel])
  declare entries: LeaderboardEntryModel[];

  @Field(() => Int)
  declare totalPlayers: number;

  @Field(() => Int, { nullable: true })
  declare viewerRank: number | null;
}
