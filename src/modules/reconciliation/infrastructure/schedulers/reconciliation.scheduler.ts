import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';

import { errorMessage } from '../../../../common/errors/domain.error';
import type { SweepResult } from '../../../../common/types/sweep-result.type';
import { ReconciliationService } from '../../application/reconciliation.service';

/**
 * Tareas programadas de reconciliación.
 * Un fallo se registra y la tarea termina; el siguiente tick reintenta.
 */
@Injectable()
export class ReconciliationScheduler {
  private readonly logger = new Logger(ReconciliationScheduler.name);

  constructor(private readonly reconciliationService: ReconciliationService) {}

  @Cron(CronExpression.EVERY_10_MINUTES, { name: 'expired-pairing-codes' })
  async expirePairingCodes(): Promise<void> {
    await this.run('expiración de códigos', 'códigos marcados como expirados', () =>
      this.reconciliationService.sweepExpiredCodes(),
    );
  }

  @Cron(CronExpression.EVERY_HOUR, { name: 'stale-pairing-codes' })
  async purgeStalePairingCodes(): Promise<void> {
    await this.run('limpieza de códigos', 'códigos antiguos eliminados', () =>
      this.reconciliationService.purgeStaleCodes(),
    );
  }

  @Cron(CronExpression.EVERY_6_HOURS, { name: 'inactive-children' })
  async checkInactiveChildren(): Promise<void> {
    await this.run('inactividad', 'avisos de inactividad emitidos', () =>
      this.reconciliationService.sweepInactiveChildren(),
    );
  }

  @Cron('0 */20 * * * *', { name: 'missed-heartbeats' })
  async checkMissedHeartbeats(): Promise<void> {
    await this.run('heartbeats perdidos', 'relaciones escaladas', () =>
      this.reconciliationService.sweepMissedHeartbeats(),
    );
  }

  private async run(
    task: string,
    summary: string,
    sweep: () => Promise<SweepResult>,
  ): Promise<void> {
    try {
      this.logger.debug(`Iniciando barrido de ${task}`);
      const result = await sweep();

      if (!result.isSuccess) {
        this.logger.error(`Error durante barrido de ${task}: ${result.error}`);
      } else if (result.count > 0) {
        this.logger.log(`${result.count} ${summary}`);
      } else {
        this.logger.debug(`Barrido de ${task} sin cambios`);
      }
    } catch (error) {
      // No relanzar: el scheduler sigue activo
      this.logger.error(`Error durante barrido de ${task}: ${errorMessage(error)}`);
    }
  }
}
