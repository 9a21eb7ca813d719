import { registerEnumType } from "@nestjs/graphql";
import type { UserRole as UserRoleContract } from "@ctf-arena/types";

export enum UserRoleModel {
  Player = "player",
  Admin = "admin"
}

registerEnumType(UserRoleModel, {
  name: "UserRole",
  description: "Role assigned to a player; admins manage challenges and read analytics."
});

export const toUserRoleModel = (role: UserRoleContract): UserRoleModel =>
  role === "admin" ? UserRoleModel.Admin : UserRoleModel.Player;
