import { Field, Int, ObjectType } from "@nestjs/graphql";
import type { UserRecord } from "../users.service";
import { toUserRoleModel, UserRoleModel } from "./user-role.enum";
import { toUserStatusModel, UserStatusModel } from "./user-status.enum";

@ObjectType("Player")
export class PlayerModel {
  @Field(() => String)
  declare id: string;

  @Field(() => String)
  declare email: string;

  @Field(() => String)
  declare username: string;

  @Field(() => [UserRoleModel])
  declare roles: UserRoleModel[];

  @Field(() => UserStatusModel)
  declare status: UserStatusModel;

  @Field(() => Int)
  declare score: number;

  @Field(() => [String], { description: "Slugs of solved challenges." })
  declare solvedChallenges: string[];

  @Field(() => String)
  declare createdAt: string;

  @Field(() => String, { nullable: true })
  declare lastSeenAt: string | null;

  static fromRecord(record: UserRecord): PlayerModel {
    const model = new PlayerModel();
    model.id = record.userId;
    model.email = record.email;
    model.username = record.username;
    model.roles = record.roles.map((role) => toUserRoleModel(role));
    model.status = toUserStatusModel(record.status);
    model.score = record.score;
    model.solvedChallenges = [...record.solvedChallenges];
    model.createdAt = record.createdAt.toISOString();
    model.lastSeenAt = record.lastSeenAt ? record.lastSeenAt.toISOString() : null;
    return model;
  }
}
