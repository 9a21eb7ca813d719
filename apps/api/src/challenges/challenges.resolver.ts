import { Args, Context, Query, Resolver } from "@nestjs/graphql";
import type { ListChallengesParams } from "@ctf-arena/types";
import { AllowAnonymous } from "../auth/auth.decorators";
import type { GraphQLContext } from "../observability/graphql-context";
import { UsersService } from "../users/users.service";
import { ChallengesService } from "./challenges.service";
import { ChallengeDifficultyModel } from "./models/challenge-difficulty.enum";
import { ChallengeModel } from "./models/challenge.model";
import { ChallengeSummaryModel } from "./models/challenge-summary.model";
import { VisitsService } from "./visits.service";

@Resolver(() => ChallengeModel)
export class ChallengesResolver {
  constructor(
    private readonly challengesService: ChallengesService,
    private readonly visitsService: VisitsService,
    private readonly usersService: UsersService
  ) {}

  @AllowAnonymous()
  @Query(() => [ChallengeSummaryModel], { name: "challenges" })
  async challenges(
    @Context() context: GraphQLContext,
    @Args("category", { type: () => String, nullable: true }) category?: string,
    @Args("difficulty", { type: () => ChallengeDifficultyModel, nullable: true }) difficulty?: ChallengeDifficultyModel
  ) {
    const params: ListChallengesParams = {};

    if (typeof category === "string" && category.length > 0) {
      params.category = category;
    }

    if (difficulty) {
      params.difficulty = difficulty;
    }

    const solved = await this.usersService.solvedSet(context.user?.id);
    return this.challengesService.listChallenges(params, solved);
  }

  @AllowAnonymous()
  @Query(() => ChallengeModel, { name: "challenge", nullable: true })
  async challenge(@Context() context: GraphQLContext, @Args("id", { type: () => String }) id: string) {
    const solved = await this.usersService.solvedSet(context.user?.id);
    const challenge = await this.challengesService.getChallenge(id, solved);

    if (challenge) {
      await this.visitsService.recordChallengeVisit(challenge.id, {
        userId: context.user?.id,
        ipAddress: context.request.ip,
        userAgent: context.request.headers["user-agent"]
      });
    }

    return challenge;
  }

  @AllowAnonymous()
  @Query(() => [String], { name: "challengeCategories" })
  async challengeCategories() {
    return this.challengesService.listCategories();
  }

  @AllowAnonymous()
  @Query(() => [ChallengeDifficultyModel], { name: "challengeDifficulties" })
  challengeDifficulties() {
    return this.challengesService.listDifficulties();
  }
}
