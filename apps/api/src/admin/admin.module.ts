import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { AuditLogEntity, AuditLogSchema } from "../audit/audit-log.schema";
import { AuditLogService } from "../audit/audit-log.service";
import { ChallengeEntity, ChallengeSchema } from "../challenges/challenge.schema";
import { ChallengesModule } from "../challenges/challenges.module";
import { SubmissionsModule } from "../submissions/submissions.module";
import { UsersModule } from "../users/users.module";
import { AdminChallengesService } from "./admin-challenges.service";
import { AdminResolver } from "./admin.resolver";
import { AnalyticsService } from "./analytics.service";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ChallengeEntity.name, schema: ChallengeSchema },
      { name: AuditLogEntity.name, schema: AuditLogSchema }
    ]),
    ChallengesModule,
    SubmissionsModule,
    UsersModule
  ],
  providers: [AdminChallengesService, AnalyticsService, AuditLogService, AdminResolver]
})
export class AdminModule {}
