import { Float, ObjectType, Field, Query, Resolver } from "@nestjs/graphql";
import { AllowAnonymous } from "./auth/auth.decorators";

@ObjectType("Health")
class HealthPayload {
  @Field(() => String)
  declare status: string;

  @Field(() => String)
  declare service: string;

  @Field(() => Float)
  declare uptime: number;
}

@Resolver()
export class HealthResolver {
  @AllowAnonymous()
  @Query(() => HealthPayload)
  health(): HealthPayload {
    return { status: "ok", service: "ctf-arena-api", uptime: process.uptime() };
  }
}
