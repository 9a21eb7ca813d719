import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument, SchemaTypes } from "mongoose";

const sanitizeResultMessage = (value: string | null | undefined): string => {
  if (typeof value !== "string") {
    return "";
  }

  return value.trim().slice(0, 500);
};

@Schema({
  collection: "submissions",
  timestamps: true,
  toJSON: { virtuals: true },
  toObject: { virtuals: true }
})
export class SubmissionEntity {
  @Prop({ type: String, required: true })
  declare userId: string;

  @Prop({ type: String, required: true })
  declare challengeId: string;

  @Prop({ type: Boolean, required: true, default: false })
  declare isCorrect: boolean;

  @Prop({ type: SchemaTypes.Mixed, required: true, default: {} })
  declare submittedData: Record<string, unknown>;

  @Prop({ type: String, required: true, set: sanitizeResultMessage })
  declare resultMessage: string;

  @Prop({ type: Number, required: true, default: 0, min: 0 })
  declare pointsEarned: number;
}

export type SubmissionDocument = HydratedDocument<SubmissionEntity>;

export const SubmissionSchema = SchemaFactory.createForClass(SubmissionEntity);

SubmissionSchema.virtual("id").get(function (this: { _id: { toString(): string } }) {
  return this._id.toString();
});

SubmissionSchema.index({ userId: 1, challengeId: 1, createdAt: -1 });
SubmissionSchema.index({ isCorrect: 1 });
SubmissionSchema.index({ createdAt: -1 });
