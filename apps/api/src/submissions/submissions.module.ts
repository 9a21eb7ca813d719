import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { ChallengesModule } from "../challenges/challenges.module";
import { UsersModule } from "../users/users.module";
import { ChallengeValidationDispatcher } from "../validation/challenge-validation.dispatcher";
import { SubmissionEntity, SubmissionSchema } from "./submission.schema";
import { SubmissionsResolver } from "./submissions.resolver";
import { SubmissionsService } from "./submissions.service";

@Module({
  imports: [
    MongooseModule.forFeature([{ name: SubmissionEntity.name, schema: SubmissionSchema }]),
    ChallengesModule,
    UsersModule
  ],
  providers: [ChallengeValidationDispatcher, SubmissionsService, SubmissionsResolver],
  exports: [SubmissionsService]
})
export class SubmissionsModule {}
