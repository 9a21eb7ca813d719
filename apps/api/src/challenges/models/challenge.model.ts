import { Field, ObjectType } from "@nestjs/graphql";
import { ChallengeSummaryModel } from "./challenge-summary.model";

@ObjectType("Challenge")
export class ChallengeModel extends ChallengeSummaryModel {
  @Field(() => String)
  declare description: string;

  @Field(() => String, { nullable: true })
  declare intro?: string | null;

  @Field(() => String, { nullable: true })
  declare playInstructions?: string | null;

  @Field(() => String, { nullable: true })
  declare frontendHint?: string | null;

  @Field(() => String)
  declare createdAt: string;

  @Field(() => String)
  declare updatedAt: string;
}
