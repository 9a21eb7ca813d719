import { registerEnumType } from "@nestjs/graphql";

export enum ChallengeDifficultyModel {
  Easy = "easy",
  Medium = "medium",
  Hard = "hard"
}

registerEnumType(ChallengeDifficultyModel, {
  name: "ChallengeDifficulty"
});
