import { Field, InputType, Int } from "@nestjs/graphql";
import { IsBoolean, IsEnum, IsInt, IsOptional, IsString, Max, MaxLength, Min, MinLength } from "class-validator";
import { ChallengeDifficultyModel } from "../../challenges/models/challenge-difficulty.enum";

@InputType("CreateChallengeInput")
export class CreateChallengeInputModel {
  @Field(() => String, { description: "Normalised to a lowercase, dash-separated slug." })
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  declare slug: string;

  @Field(() => String, { description: "Identifier of the validation rule, \"1\" to \"15\"." })
  @IsString()
  @MinLength(1)
  @MaxLength(2)
  declare ruleId: string;

  @Field(() => String)
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  declare title: string;

  @Field(() => String)
  @IsString()
  @MinLength(1)
  @MaxLength(50)
  declare category: string;

  @Field(() => String)
  @IsString()
  @MinLength(1)
  @MaxLength(5000)
  declare description: string;

  @Field(() => String)
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  declare flag: string;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  declare intro?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  declare playInstructions?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  declare frontendHint?: string | null;

  @Field(() => Int, { nullable: true })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  declare points?: number | null;

  @Field(() => ChallengeDifficultyModel, { nullable: true })
  @IsOptional()
  @IsEnum(ChallengeDifficultyModel)
  declare difficulty?: ChallengeDifficultyModel | null;

  @Field(() => Boolean, { nullable: true })
  @IsOptional()
  @IsBoolean()
  declare isActive?: boolean | null;
}

@InputType("UpdateChallengeInput")
export class UpdateChallengeInputModel {
  @Field(() => String)
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  declare id: string;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(2)
  declare ruleId?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  declare title?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  declare category?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  declare description?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  declare flag?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  declare intro?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  declare playInstructions?: string | null;

  @Field(() => String, { nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  declare frontendHint?: string | null;

  @Field(() => Int, { nullable: true })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  declare points?: number | null;

  @Field(() => ChallengeDifficultyModel, { nullable: true })
  @IsOptional()
  @IsEnum(ChallengeDifficultyModel)
  declare difficulty?: ChallengeDifficultyModel | null;

  @Field(() => Boolean, { nullable: true })
  @IsOptional()
  @IsBoolean()
  declare isActive?: boolean | null;
}
