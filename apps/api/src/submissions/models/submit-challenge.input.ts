import { Field, InputType } from "@nestjs/graphql";
import { Type } from "class-transformer";
import { ArrayMaxSize, IsArray, IsString, Length, ValidateNested } from "class-validator";
import { MAX_SUBMISSION_FIELDS } from "../submission-payload";
import { SubmissionFieldInputModel } from "./submission-field.model";

@InputType("SubmitChallengeInput")
export class SubmitChallengeInputModel {
  @Field(() => String, { description: "Slug of the challenge being attempted." })
  @IsString()
  @Length(1, 100)
  declare challengeId: string;

  @Field(() => [SubmissionFieldInputModel], {
    description: "Form fields of the attempt, e.g. { name: \"username\", value: \"admin\" }."
  })
  @IsArray()
  @ArrayMaxSize(MAX_SUBMISSION_FIELDS)
  @ValidateNested({ each: true })
  @Type(() => SubmissionFieldInputModel)
  declare fields: SubmissionFieldInputModel[];
}
