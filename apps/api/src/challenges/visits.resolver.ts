import { Args, Context, Mutation, Resolver } from "@nestjs/graphql";
import { AllowAnonymous, RateLimit } from "../auth/auth.decorators";
import type { GraphQLContext } from "../observability/graphql-context";
import { VisitsService } from "./visits.service";

@Resolver()
export class VisitsResolver {
  constructor(private readonly visitsService: VisitsService) {}

  @AllowAnonymous()
  @RateLimit({ windowMs: 60_000, max: 120 })
  @Mutation(() => Boolean, { name: "recordPageVisit" })
  async recordPageVisit(@Context() context: GraphQLContext, @Args("page", { type: () => String }) page: string) {
    return this.visitsService.recordPageVisit(page, {
      userId: context.user?.id,
      ipAddress: context.request.ip,
      userAgent: context.request.headers["user-agent"]
    });
  }
}
