import { UnauthorizedException } from "@nestjs/common";
import { Args, Context, Int, Query, Resolver } from "@nestjs/graphql";
import { AllowAnonymous, Roles } from "../auth/auth.decorators";
import type { GraphQLContext } from "../observability/graphql-context";
import { LeaderboardService } from "./leaderboard.service";
import { LeaderboardModel } from "./models/leaderboard.model";
import { PlayerProgressModel } from "./models/player-progress.model";

@Resolver(() => LeaderboardModel)
export class LeaderboardResolver {
  constructor(private readonly leaderboardService: LeaderboardService) {}

  @AllowAnonymous()
  @Query(() => LeaderboardModel, { name: "leaderboard" })
  async leaderboard(
    @Context() context: GraphQLContext,
    @Args("limit", { type: () => Int, nullable: true }) limit?: number
  ) {
    return this.leaderboardService.getLeaderboard({ limit, viewerId: context.user?.id });
  }

  @Roles("player", "admin")
  @Query(() => PlayerProgressModel, { name: "myProgress" })
  async myProgress(@Context() context: GraphQLContext) {
    if (!context.user) {
      throw new UnauthorizedException("Authentication is required to view progress.");
    }

    return this.leaderboardService.getProgress(context.user.id);
  }
}
