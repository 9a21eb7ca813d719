import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument, SchemaTypes } from "mongoose";

export type AuditLogDocument = HydratedDocument<AuditLogEntity>;

@Schema({
  collection: "audit_logs",
  timestamps: true
})
export class AuditLogEntity {
  @Prop({ type: String, required: true, trim: true })
  declare eventType: string;

  @Prop({ type: String, required: true, trim: true })
  declare actorType: string;

  @Prop({ type: String, required: false, trim: true })
  declare actorId?: string;

  @Prop({ type: String, required: true, trim: true, enum: ["succeeded", "failed"] })
  declare outcome: string;

  @Prop({ type: String, required: true, trim: true })
  declare resourceType: string;

  @Prop({ type: String, required: false, trim: true })
  declare resourceId?: string;

  @Prop({ type: SchemaTypes.Mixed, required: false })
  declare metadata?: Record<string, unknown>;
}

export const AuditLogSchema = SchemaFactory.createForClass(AuditLogEntity);

AuditLogSchema.index({ eventType: 1, createdAt: -1 });
