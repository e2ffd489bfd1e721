import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { AuthModule } from '../auth/auth.module';
import { PairingModule } from '../pairing/pairing.module';

// Application
import { AppRestrictionsService } from './application/app-restrictions.service';
import { BedtimeService } from './application/bedtime.service';
import { NewAppDetectionService } from './application/new-app-detection.service';

// Infrastructure
import { RESTRICTIONS_INJECTION_TOKENS } from './domain/constants/restrictions.constants';
import { MongoDbAppRestrictionsRepository } from './infrastructure/adapters/mongodb-app-restrictions.repository';
import { MongoDbBedtimeSettingsRepository } from './infrastructure/adapters/mongodb-bedtime-settings.repository';
import { MongoDbNewAppDetectionsRepository } from './infrastructure/adapters/mongodb-new-app-detections.repository';
import { DeviceStateCache } from './infrastructure/cache/device-state.cache';
import { RestrictionsController } from './infrastructure/controllers/restrictions.controller';
import { RestrictionsScheduler } from './infrastructure/schedulers/restrictions.scheduler';
import {
  AppRestrictionSchema,
  AppRestrictionSchemaFactory,
} from './infrastructure/schemas/app-restriction.schema';
import {
  BedtimeSettingsSchema,
  BedtimeSettingsSchemaFactory,
} from './infrastructure/schemas/bedtime-settings.schema';
import {
  NewAppDetectionSchema,
  NewAppDetectionSchemaFactory,
} from './infrastructure/schemas/new-app-detection.schema';

@Module({
  imports: [
    AuthModule,
    PairingModule,
    MongooseModule.forFeature([
      {
        name: AppRestrictionSchema.name,
        schema: AppRestrictionSchemaFactory,
      },
      {
        name: BedtimeSettingsSchema.name,
        schema: BedtimeSettingsSchemaFactory,
      },
      {
        name: NewAppDetectionSchema.name,
        schema: NewAppDetectionSchemaFactory,
      },
    ]),
  ],
  controllers: [RestrictionsController],
  providers: [
    // Adapters
    {
      provide: RESTRICTIONS_INJECTION_TOKENS.APP_RESTRICTIONS_REPOSITORY,
      useClass: MongoDbAppRestrictionsRepository,
    },
    {
      provide: RESTRICTIONS_INJECTION_TOKENS.BEDTIME_SETTINGS_REPOSITORY,
      useClass: MongoDbBedtimeSettingsRepository,
    },
    {
      provide: RESTRICTIONS_INJECTION_TOKENS.NEW_APP_DETECTIONS_REPOSITORY,
      useClass: MongoDbNewAppDetectionsRepository,
    },
    {
      provide: RESTRICTIONS_INJECTION_TOKENS.DEVICE_STATE_CACHE,
      useClass: DeviceStateCache,
    },

    // Services
    AppRestrictionsService,
    BedtimeService,
    NewAppDetectionService,

    // Schedulers
    RestrictionsScheduler,
  ],
})
export class RestrictionsModule {}
