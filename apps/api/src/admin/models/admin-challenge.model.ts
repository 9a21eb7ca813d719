import { Field, Int, ObjectType } from "@nestjs/graphql";
import { ChallengeModel } from "../../challenges/models/challenge.model";

@ObjectType("AdminChallenge")
export class AdminChallengeModel extends ChallengeModel {
  @Field(() => String)
  declare flag: string;
}

@ObjectType("DeleteChallengeResult")
export class DeleteChallengeResultModel {
  @Field(() => String)
  declare id: string;

  @Field(() => Int)
  declare deletedSubmissions: number;

  @Field(() => Int)
  declare deletedVisits: number;
}
