import { Field, ObjectType } from "@nestjs/graphql";
import { rolePermissions, type UserPermission } from "@ctf-arena/types";
import type { AuthenticatedUser } from "../../auth/auth.types";
import { toUserRoleModel, UserRoleModel } from "./user-role.enum";
import { toUserStatusModel, UserStatusModel } from "./user-status.enum";

@ObjectType("ViewerUser")
export class ViewerUserModel {
  @Field(() => String)
  declare id: string;

  @Field(() => String)
  declare email: string;

  @Field(() => String)
  declare username: string;

  @Field(() => [UserRoleModel])
  declare roles: UserRoleModel[];

  @Field(() => [String])
  declare permissions: string[];

  @Field(() => UserStatusModel)
  declare status: UserStatusModel;

  static fromUser(user: AuthenticatedUser): ViewerUserModel {
    const permissions = new Set<UserPermission>();
    for (const role of user.roles) {
      rolePermissions[role].forEach((permission) => permissions.add(permission));
    }

    const model = new ViewerUserModel();
    model.id = user.id;
    model.email = user.email;
    model.username = user.username;
    model.roles = user.roles.map((role) => toUserRoleModel(role));
    model.permissions = [...permissions];
    model.status = toUserStatusModel(user.status);
    return model;
  }
}
