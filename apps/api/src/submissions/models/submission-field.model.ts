import { Field, InputType, ObjectType } from "@nestjs/graphql";
import { IsString, Length, MaxLength } from "class-validator";

@InputType("SubmissionFieldInput")
export class SubmissionFieldInputModel {
  @Field(() => String)
  @IsString()
  @Length(1, 64)
  declare name: string;

  @Field(() => String)
  @IsString()
  @MaxLength(4096)
  declare value: string;
}

@ObjectType("SubmissionField")
export class SubmissionFieldModel {
  @Field(() => String)
  declare name: string;

  @Field(() => String)
  declare value: string;
}
