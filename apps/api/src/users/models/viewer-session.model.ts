import { Field, ObjectType } from "@nestjs/graphql";
import type { AuthenticatedSession } from "../../auth/auth.types";

@ObjectType("ViewerSession")
export class ViewerSessionModel {
  @Field(() => String)
  declare id: string;

  @Field(() => String)
  declare userId: string;

  @Field(() => String)
  declare issuedAt: string;

  @Field(() => String)
  declare expiresAt: string;

  @Field(() => String, { nullable: true })
  declare ipAddress?: string | null;

  @Field(() => String, { nullable: true })
  declare userAgent?: string | null;

  @Field(() => String)
  declare status: string;

  static fromSession(session: AuthenticatedSession): ViewerSessionModel {
    const model = new ViewerSessionModel();
    model.id = session.id;
    model.userId = session.userId;
    model.issuedAt = session.issuedAt;
    model.expiresAt = session.expiresAt;
    model.ipAddress = session.ipAddress ?? null;
    model.userAgent = session.userAgent ?? null;
    model.status = session.status;
    return model;
  }
}
