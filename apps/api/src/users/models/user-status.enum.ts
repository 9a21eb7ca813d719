import { registerEnumType } from "@nestjs/graphql";
import type { UserStatus as UserStatusContract } from "@ctf-arena/types";

export enum UserStatusModel {
  Active = "active",
  Disabled = "disabled"
}

registerEnumType(UserStatusModel, {
  name: "UserStatus",
  description: "Disabled players can browse but not submit."
});

export const toUserStatusModel = (status: UserStatusContract): UserStatusModel =>
  status === "active" ? UserStatusModel.Active : UserStatusModel.Disabled;
