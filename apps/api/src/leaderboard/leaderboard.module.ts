import { Module } from "@nestjs/common";
import { ChallengesModule } from "../challenges/challenges.module";
import { SubmissionsModule } from "../submissions/submissions.module";
import { UsersModule } from "../users/users.module";
import { LeaderboardResolver } from "./leaderboard.resolver";
import { LeaderboardService } from "./leaderboard.service";

@Module({
  imports: [UsersModule, ChallengesModule, SubmissionsModule],
  providers: [LeaderboardService, LeaderboardResolver]
})
export class LeaderboardModule {}
