import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { ArenaConfigService } from "../arena.config";
import { UsersModule } from "../users/users.module";
import { ChallengeEntity, ChallengeSchema } from "./challenge.schema";
import { ChallengesResolver } from "./challenges.resolver";
import { ChallengesService } from "./challenges.service";
import { VisitEntity, VisitSchema } from "./visit.schema";
import { VisitsResolver } from "./visits.resolver";
import { VisitsService } from "./visits.service";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ChallengeEntity.name, schema: ChallengeSchema },
      { name: VisitEntity.name, schema: VisitSchema }
    ]),
    UsersModule
  ],
  providers: [ArenaConfigService, ChallengesService, VisitsService, ChallengesResolver, VisitsResolver],
  exports: [ChallengesService, VisitsService]
})
export class ChallengesModule {}
