import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { AuthModule } from '../auth/auth.module';
import { PairingModule } from '../pairing/pairing.module';
import { UsersModule } from '../users/users.module';

import { ActivityService } from './application/activity.service';
import { HEARTBEATS_INJECTION_TOKENS } from './domain/constants/heartbeats.constants';
import { MongoDbHeartbeatsRepository } from './infrastructure/adapters/mongodb-heartbeats.repository';
import { ActivityController } from './infrastructure/controllers/activity.controller';
import {
  HeartbeatSchema,
  HeartbeatSchemaFactory,
} from './infrastructure/schemas/heartbeat.schema';

@Module({
  imports: [
    AuthModule,
    UsersModule,
    PairingModule,
    MongooseModule.forFeature([
      {
        name: HeartbeatSchema.name,
        schema: HeartbeatSchemaFactory,
      },
    ]),
  ],
  controllers: [ActivityController],
  providers: [
    {
      provide: HEARTBEATS_INJECTION_TOKENS.HEARTBEATS_REPOSITORY,
      useClass: MongoDbHeartbeatsRepository,
    },
    ActivityService,
  ],
})
export class HeartbeatsModule {}
