import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { UserEntity, UserSchema } from "./user.schema";
import { UsersService } from "./users.service";
import { ViewerResolver } from "./viewer.resolver";

@Module({
  imports: [MongooseModule.forFeature([{ name: UserEntity.name, schema: UserSchema }])],
  providers: [UsersService, ViewerResolver],
  exports: [UsersService]
})
export class UsersModule {}
