import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import type { UserRole, UserStatus } from "@ctf-arena/types";
import { HydratedDocument } from "mongoose";

export type UserDocument = HydratedDocument<UserEntity>;

@Schema({
  collection: "users",
  timestamps: true,
  toJSON: { virtuals: true },
  toObject: { virtuals: true }
})
export class UserEntity {
  @Prop({ type: String, required: true, unique: true, trim: true })
  declare userId: string;

  @Prop({ type: String, required: true, unique: true, lowercase: true, trim: true })
  declare email: string;

  @Prop({ type: String, required: true, unique: true, trim: true, minlength: 3, maxlength: 50 })
  declare username: string;

  @Prop({
    type: [String],
    required: true,
    default: ["player"],
    enum: ["player", "admin"]
  })
  declare roles: UserRole[];

  @Prop({
    type: String,
    required: true,
    lowercase: true,
    trim: true,
    enum: ["active", "disabled"],
    default: "active"
  })
  declare status: UserStatus;

  @Prop({ type: Number, required: true, default: 0, min: 0 })
  declare score: number;

  @Prop({ type: [String], required: true, default: [] })
  declare solvedChallenges: string[];

  @Prop({ type: Date, required: false, default: null })
  declare lastSeenAt?: Date | null;
}

export const UserSchema = SchemaFactory.createForClass(UserEntity);

UserSchema.virtual("id").get(function (this: UserEntity) {
  return this.userId;
});

UserSchema.index({ status: 1, score: -1, username: 1 });
