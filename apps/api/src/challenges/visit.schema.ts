import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument } from "mongoose";

export type VisitDocument = HydratedDocument<VisitEntity>;

/**
 * One page or challenge view. Challenge views carry `challengeId`; plain page
 * views carry `page`.
 */
@Schema({
  collection: "visits",
  timestamps: true
})
export class VisitEntity {
  @Prop({ type: String, required: false, default: null, index: true })
  declare challengeId?: string | null;

  @Prop({ type: String, required: false, default: null, trim: true, maxlength: 500 })
  declare page?: string | null;

  @Prop({ type: String, required: false, default: null, index: true })
  declare userId?: string | null;

  @Prop({ type: String, required: true, default: "unknown" })
  declare ipAddress: string;

  @Prop({ type: String, required: true, default: "" })
  declare userAgent: string;
}

export const VisitSchema = SchemaFactory.createForClass(VisitEntity);

VisitSchema.index({ createdAt: -1 });
