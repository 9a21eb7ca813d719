import { join } from "node:path";
import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";
import { GraphQLModule } from "@nestjs/graphql";
import { MongooseModule } from "@nestjs/mongoose";
import { MercuriusDriver, MercuriusDriverConfig } from "@nestjs/mercurius";
import { AdminModule } from "./admin/admin.module";
import { resolveMongoUri } from "./arena.config";
import { AuthAuditService } from "./auth/auth-audit.service";
import { RateLimitGuard } from "./auth/rate-limit.guard";
import { RateLimitService } from "./auth/rate-limit.service";
import { RolesGuard } from "./auth/roles.guard";
import { ChallengesModule } from "./challenges/challenges.module";
import { HealthResolver } from "./health.resolver";
import { LeaderboardModule } from "./leaderboard/leaderboard.module";
import { buildGraphQLContext } from "./observability/graphql-context";
import { structuredErrorFormatter } from "./observability/error-formatter";
import { RedisService } from "./redis/redis.service";
import { SubmissionsModule } from "./submissions/submissions.module";
import { UsersModule } from "./users/users.module";

@Module({
  imports: [
    GraphQLModule.forRoot<MercuriusDriverConfig>({
      driver: MercuriusDriver,
      autoSchemaFile: join(process.cwd(), "apps/api/schema.gql"),
      sortSchema: true,
      path: "/graphql",
      graphiql: process.env.NODE_ENV !== "production",
      context: buildGraphQLContext,
      errorFormatter: structuredErrorFormatter
    }),
    MongooseModule.forRoot(resolveMongoUri()),
    UsersModule,
    ChallengesModule,
    SubmissionsModule,
    LeaderboardModule,
    AdminModule
  ],
  providers: [
    HealthResolver,
    RedisService,
    RateLimitService,
    AuthAuditService,
    {
      provide: APP_GUARD,
      useClass: RateLimitGuard
    },
    {
      provide: APP_GUARD,
      useClass: RolesGuard
    }
  ]
})
export class AppModule {}
