import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';

import { errorMessage } from '../../../../common/errors/domain.error';
import { AppRestrictionsService } from '../../application/app-restrictions.service';
import { BedtimeService } from '../../application/bedtime.service';

@Injectable()
export class RestrictionsScheduler {
  private readonly logger = new Logger(RestrictionsScheduler.name);

  constructor(
    private readonly bedtimeService: BedtimeService,
    private readonly appRestrictionsService: AppRestrictionsService,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE, { name: 'bedtime-enforcement' })
  async enforceBedtime(): Promise<void> {
    try {
      const result = await this.bedtimeService.enforceBedtime();
      if (!result.isSuccess) {
        this.logger.error(`Error aplicando horarios de descanso: ${result.error}`);
        return;
      }
      this.logger.debug(`${result.count} horarios de descanso publicados`);
    } catch (error) {
      this.logger.error(`Error aplicando horarios de descanso: ${errorMessage(error)}`);
    }
  }

  @Cron(CronExpression.EVERY_10_MINUTES, { name: 'daily-usage-rollover' })
  async rollOverDailyUsage(): Promise<void> {
    try {
      const result = await this.appRestrictionsService.sweepDailyRollover();
      if (!result.isSuccess) {
        this.logger.error(`Error reiniciando el uso diario: ${result.error}`);
      } else if (result.count > 0) {
        this.logger.log(`${result.count} apps desbloqueadas por cambio de día`);
      }
    } catch (error) {
      this.logger.error(`Error reiniciando el uso diario: ${errorMessage(error)}`);
    }
  }
}
