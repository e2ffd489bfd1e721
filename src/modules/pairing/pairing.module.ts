import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../users/users.module';

// Application
import { PairingService } from './application/pairing.service';
import { PairingCodeGenerator } from './application/pairing-code.generator';

// Infrastructure
import { PAIRING_INJECTION_TOKENS } from './domain/constants/pairing.constants';
import { MongoDbPairingCodesRepository } from './infrastructure/adapters/mongodb-pairing-codes.repository';
import { MongoDbRelationshipsRepository } from './infrastructure/adapters/mongodb-relationships.repository';
import { MongoDbPairingUnitOfWork } from './infrastructure/adapters/mongodb-pairing.unit-of-work';
import { PairingController } from './infrastructure/controllers/pairing.controller';
import { PairingCodeExpiryScheduler } from './infrastructure/schedulers/pairing-code-expiry.scheduler';
import {
  PairingCodeSchema,
  PairingCodeSchemaFactory,
} from './infrastructure/schemas/pairing-code.schema';
import {
  RelationshipSchema,
  RelationshipSchemaFactory,
} from './infrastructure/schemas/relationship.schema';

@Module({
  imports: [
    AuthModule,
    UsersModule,
    MongooseModule.forFeature([
      {
        name: PairingCodeSchema.name,
        schema: PairingCodeSchemaFactory,
      },
      {
        name: RelationshipSchema.name,
        schema: RelationshipSchemaFactory,
      },
    ]),
  ],
  controllers: [PairingController],
  providers: [
    // Adapters
    {
      provide: INJECTION_TOKENS.PAIRING_CODES_REPOSITORY,
      useClass: MongoDbPairingCodesRepository,
    },
    {
      provide: INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY,
      useClass: MongoDbRelationshipsRepository,
    },
    {
      provide: PAIRING_INJECTION_TOKENS.PAIRING_UNIT_OF_WORK,
      useClass: MongoDbPairingUnitOfWork,
    },

    // Services
    PairingCodeGenerator,
    PairingService,

    // Schedulers
    PairingCodeExpiryScheduler,
  ],
  exports: [
    INJECTION_TOKENS.PAIRING_CODES_REPOSITORY,
    INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY,
  ],
})
export class PairingModule {}
