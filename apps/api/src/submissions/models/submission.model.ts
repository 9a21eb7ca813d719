import { Field, Int, ObjectType } from "@nestjs/graphql";
import type { Submission } from "@ctf-arena/types";
import { toSubmissionFields } from "../submission-payload";
import { SubmissionFieldModel } from "./submission-field.model";

@ObjectType("Submission")
export class SubmissionModel {
  @Field(() => String)
  declare id: string;

  @Field(() => String)
  declare challengeId: string;

  @Field(() => Boolean)
  declare isCorrect: boolean;

  @Field(() => [SubmissionFieldModel])
  declare fields: SubmissionFieldModel[];

  @Field(() => String)
  declare resultMessage: string;

  @Field(() => Int)
  declare pointsEarned: number;

  @Field(() => String)
  declare createdAt: string;

  static fromSubmission(submission: Submission): SubmissionModel {
    const model = new SubmissionModel();
    model.id = submission.id;
    model.challengeId = submission.challengeId;
    model.isCorrect = submission.isCorrect;
    model.fields = toSubmissionFields(submission.submittedData);
    model.resultMessage = submission.resultMessage;
    model.pointsEarned = submission.pointsEarned;
    model.createdAt = submission.createdAt;
    return model;
  }
}
