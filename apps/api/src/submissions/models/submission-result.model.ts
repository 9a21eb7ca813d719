import { Field, Int, ObjectType } from "@nestjs/graphql";

@ObjectType("SubmissionResult")
export class SubmissionResultModel {
  @Field(() => Boolean)
  declare isCorrect: boolean;

  @Field(() => String)
  declare message: string;

  @Field(() => Int)
  declare pointsEarned: number;
}
