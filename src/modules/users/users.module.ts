import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { AuthModule } from '../auth/auth.module';
import { UserProfilesService } from './application/user-profiles.service';
import { MongoDbUserProfilesRepository } from './infrastructure/adapters/mongodb-user-profiles.repository';
import { ProfileController } from './infrastructure/controllers/profile.controller';
import {
  UserProfileSchema,
  UserProfileSchemaFactory,
} from './infrastructure/schemas/user-profile.schema';

@Module({
  imports: [
    AuthModule,
    MongooseModule.forFeature([
      { name: UserProfileSchema.name, schema: UserProfileSchemaFactory },
    ]),
  ],
  controllers: [ProfileController],
  providers: [
    {
      provide: INJECTION_TOKENS.USER_PROFILES_REPOSITORY,
      useClass: MongoDbUserProfilesRepository,
    },
    UserProfilesService,
  ],
  exports: [INJECTION_TOKENS.USER_PROFILES_REPOSITORY, MongooseModule],
})
export class UsersModule {}
