import { Module } from '@nestjs/common';

import { PairingModule } from '../pairing/pairing.module';
import { UsersModule } from '../users/users.module';

import { ReconciliationService } from './application/reconciliation.service';
import { ReconciliationScheduler } from './infrastructure/schedulers/reconciliation.scheduler';

@Module({
  imports: [PairingModule, UsersModule],
  providers: [ReconciliationService, ReconciliationScheduler],
})
export class ReconciliationModule {}
