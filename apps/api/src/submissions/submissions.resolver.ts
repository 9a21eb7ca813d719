import { UnauthorizedException } from "@nestjs/common";
import { Args, Context, Mutation, Query, Resolver } from "@nestjs/graphql";
import { RateLimit, Roles } from "../auth/auth.decorators";
import type { GraphQLContext } from "../observability/graphql-context";
import { SubmissionResultModel } from "./models/submission-result.model";
import { SubmissionModel } from "./models/submission.model";
import { SubmitChallengeInputModel } from "./models/submit-challenge.input";
import { SubmissionsService } from "./submissions.service";

@Resolver(() => SubmissionModel)
export class SubmissionsResolver {
  constructor(private readonly submissionsService: SubmissionsService) {}

  @Roles("player", "admin")
  @RateLimit({ windowMs: 60_000, max: 30 })
  @Mutation(() => SubmissionResultModel, { name: "submitChallenge" })
  async submitChallenge(
    @Context() context: GraphQLContext,
    @Args("input", { type: () => SubmitChallengeInputModel }) input: SubmitChallengeInputModel
  ) {
    if (!context.user) {
      throw new UnauthorizedException("Authentication is required to submit a solution.");
    }

    return this.submissionsService.submit({
      challengeId: input.challengeId,
      fields: input.fields,
      user: context.user,
      logger: context.logger,
      requestId: context.requestId
    });
  }

  @Roles("player", "admin")
  @Query(() => [SubmissionModel], { name: "mySubmissions" })
  async mySubmissions(
    @Context() context: GraphQLContext,
    @Args("challengeId", { type: () => String }) challengeId: string
  ) {
    if (!context.user) {
      throw new UnauthorizedException("Authentication is required to view submissions.");
    }

    const submissions = await this.submissionsService.listForChallenge(context.user.id, challengeId);
    return submissions.map((submission) => SubmissionModel.fromSubmission(submission));
  }
}
