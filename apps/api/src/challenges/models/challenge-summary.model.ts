import { Field, Int, ObjectType } from "@nestjs/graphql";
import type { ChallengeId } from "@ctf-arena/types";
import { ChallengeDifficultyModel } from "./challenge-difficulty.enum";

@ObjectType("ChallengeSummary")
export class ChallengeSummaryModel {
  @Field(() => String, { description: "Public slug of the challenge." })
  declare id: string;

  @Field(() => String, { description: "Identifier of the validation rule that checks submissions." })
  declare ruleId: ChallengeId;

  @Field(() => String)
  declare title: string;

  @Field(() => String)
  declare category: string;

  @Field(() => Int)
  declare points: number;

  @Field(() => ChallengeDifficultyModel)
  declare difficulty: ChallengeDifficultyModel;

  @Field(() => Boolean)
  declare isActive: boolean;

  @Field(() => Int)
  declare solveCount: number;

  @Field(() => Boolean, { nullable: true, description: "Null for anonymous viewers." })
  declare isSolved?: boolean | null;
}
