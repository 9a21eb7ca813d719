import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { CHALLENGE_IDS, type ChallengeDifficulty, type ChallengeId } from "@ctf-arena/types";
import { HydratedDocument } from "mongoose";

export type ChallengeDocument = HydratedDocument<ChallengeEntity>;

@Schema({
  collection: "challenges",
  timestamps: true,
  toJSON: { virtuals: true },
  toObject: { virtuals: true }
})
export class ChallengeEntity {
  @Prop({ type: String, required: true, unique: true, lowercase: true, trim: true })
  declare slug: string;

  @Prop({ type: String, required: true, enum: [...CHALLENGE_IDS] })
  declare ruleId: ChallengeId;

  @Prop({ type: String, required: true, trim: true, maxlength: 200 })
  declare title: string;

  @Prop({ type: String, required: true, trim: true, maxlength: 50 })
  declare category: string;

  @Prop({ type: String, required: true, trim: true })
  declare description: string;

  @Prop({ type: String, required: false, default: null })
  declare intro?: string | null;

  @Prop({ type: String, required: false, default: null })
  declare playInstructions?: string | null;

  @Prop({ type: Number, required: true, default: 10, min: 1, max: 100 })
  declare points: number;

  @Prop({ type: String, required: true, enum: ["easy", "medium", "hard"], default: "easy" })
  declare difficulty: ChallengeDifficulty;

  @Prop({ type: Boolean, required: true, default: true })
  declare isActive: boolean;

  @Prop({ type: String, required: false, default: null })
  declare frontendHint?: string | null;

  @Prop({ type: String, required: true })
  declare flag: string;

  @Prop({ type: Number, required: true, default: 0, min: 0 })
  declare solveCount: number;
}

export const ChallengeSchema = SchemaFactory.createForClass(ChallengeEntity);

ChallengeSchema.virtual("id").get(function (this: ChallengeEntity) {
  return this.slug;
});

ChallengeSchema.index({ category: 1 });
ChallengeSchema.index({ isActive: 1, ruleId: 1 });
