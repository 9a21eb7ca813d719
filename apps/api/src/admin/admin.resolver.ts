import { UnauthorizedException } from "@nestjs/common";
import { Args, Context, Mutation, Query, Resolver } from "@nestjs/graphql";
import type { UserRole } from "@ctf-arena/types";
import type { AuditLogInput } from "../audit/audit-log.service";
import { AuditLogService } from "../audit/audit-log.service";
import { RateLimit, Roles } from "../auth/auth.decorators";
import type { AuthenticatedUser } from "../auth/auth.types";
import type { GraphQLContext } from "../observability/graphql-context";
import { PlayerModel } from "../users/models/player.model";
import { UserRoleModel } from "../users/models/user-role.enum";
import { UsersService } from "../users/users.service";
import { AdminChallengesService } from "./admin-challenges.service";
import { AnalyticsService } from "./analytics.service";
import { AdminChallengeModel, DeleteChallengeResultModel } from "./models/admin-challenge.model";
import {
  ChallengeVisitStatsModel,
  PageVisitStatsModel,
  PlatformAnalyticsModel,
  UserAnalyticsModel
} from "./models/analytics.model";
import { CreateChallengeInputModel, UpdateChallengeInputModel } from "./models/challenge.input";

interface AuditedAction {
  eventType: string;
  resourceType: string;
  resourceId?: string;
  metadata?: Record<string, unknown>;
}

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

@Roles("admin")
@Resolver()
export class AdminResolver {
  constructor(
    private readonly adminChallengesService: AdminChallengesService,
    private readonly analytics: AnalyticsService,
    private readonly usersService: UsersService,
    private readonly auditLogService: AuditLogService
  ) {}

  @RateLimit({ windowMs: 60_000, max: 30 })
  @Query(() => [AdminChallengeModel], { name: "adminChallenges" })
  async adminChallenges() {
    return this.adminChallengesService.listChallenges();
  }

  @RateLimit({ windowMs: 60_000, max: 10 })
  @Mutation(() => AdminChallengeModel, { name: "createChallenge" })
  async createChallenge(
    @Context() context: GraphQLContext,
    @Args("input", { type: () => CreateChallengeInputModel }) input: CreateChallengeInputModel
  ) {
    return this.audited(
      context,
      { eventType: "challenge.admin.create", resourceType: "challenge", resourceId: input.slug },
      () => this.adminChallengesService.createChallenge(input)
    );
  }

  @RateLimit({ windowMs: 60_000, max: 15 })
  @Mutation(() => AdminChallengeModel, { name: "updateChallenge" })
  async updateChallenge(
    @Context() context: GraphQLContext,
    @Args("input", { type: () => UpdateChallengeInputModel }) input: UpdateChallengeInputModel
  ) {
    return this.audited(
      context,
      { eventType: "challenge.admin.update", resourceType: "challenge", resourceId: input.id },
      () => this.adminChallengesService.updateChallenge(input)
    );
  }

  @RateLimit({ windowMs: 60_000, max: 10 })
  @Mutation(() => DeleteChallengeResultModel, { name: "deleteChallenge" })
  async deleteChallenge(@Context() context: GraphQLContext, @Args("id", { type: () => String }) id: string) {
    return this.audited(
      context,
      { eventType: "challenge.admin.delete", resourceType: "challenge", resourceId: id },
      () => this.adminChallengesService.deleteChallenge(id)
    );
  }

  @RateLimit({ windowMs: 60_000, max: 30 })
  @Query(() => [PlayerModel], { name: "adminUsers" })
  async adminUsers() {
    const players = await this.usersService.listPlayers();
    return players.map((player) => PlayerModel.fromRecord(player));
  }

  @RateLimit({ windowMs: 60_000, max: 10 })
  @Mutation(() => PlayerModel, { name: "updateUserRole" })
  async updateUserRole(
    @Context() context: GraphQLContext,
    @Args("userId", { type: () => String }) userId: string,
    @Args("role", { type: () => UserRoleModel }) role: UserRoleModel
  ) {
    const nextRole: UserRole = role === UserRoleModel.Admin ? "admin" : "player";
    const updated = await this.audited(
      context,
      { eventType: "user.admin.role_update", resourceType: "user", resourceId: userId, metadata: { role: nextRole } },
      () => this.usersService.updateRole(userId, nextRole)
    );

    return PlayerModel.fromRecord(updated);
  }

  @RateLimit({ windowMs: 60_000, max: 30 })
  @Query(() => [ChallengeVisitStatsModel], { name: "challengeVisitStats" })
  async challengeVisitStats() {
    return this.analytics.challengeVisitStats();
  }

  @RateLimit({ windowMs: 60_000, max: 30 })
  @Query(() => UserAnalyticsModel, { name: "userAnalytics" })
  async userAnalytics() {
    return this.analytics.userAnalytics();
  }

  @RateLimit({ windowMs: 60_000, max: 30 })
  @Query(() => PlatformAnalyticsModel, { name: "platformAnalytics" })
  async platformAnalytics() {
    return this.analytics.platformAnalytics();
  }

  @RateLimit({ windowMs: 60_000, max: 30 })
  @Query(() => PageVisitStatsModel, { name: "visitStats" })
  async visitStats() {
    return this.analytics.pageVisitStats();
  }

  private async audited<T>(context: GraphQLContext, action: AuditedAction, operation: () => Promise<T>): Promise<T> {
    const actor = this.requireActor(context);
    const base = {
      eventType: action.eventType,
      actorType: "user" as const,
      actorId: actor.id,
      resourceType: action.resourceType,
      resourceId: action.resourceId
    };

    try {
      const result = await operation();
      await this.recordAudit(context, {
        ...base,
        outcome: "succeeded",
        metadata: { requestId: context.requestId, ...action.metadata }
      });
      return result;
    } catch (error) {
      await this.recordAudit(context, {
        ...base,
        outcome: "failed",
        metadata: { requestId: context.requestId, ...action.metadata, error: describeError(error) }
      });
      throw error;
    }
  }

  /** An audit write failure is logged and never masks the mutation's own result. */
  private async recordAudit(context: GraphQLContext, entry: AuditLogInput) {
    try {
      await this.auditLogService.record(entry);
    } catch (error) {
      context.logger.warn(
        { event: "audit.write_failed", eventType: entry.eventType, error: describeError(error) },
        "Failed to write audit log entry"
      );
    }
  }

  private requireActor(context: GraphQLContext): AuthenticatedUser {
    if (!context.user) {
      throw new UnauthorizedException("Authentication required.");
    }

    return context.user;
  }
}
