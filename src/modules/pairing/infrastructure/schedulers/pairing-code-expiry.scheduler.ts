import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { errorMessage } from '../../../../common/errors/domain.error';
import type { IClock } from '../../../../common/interfaces/clock.interface';
import type { PairingCode } from '../../domain/models/pairing-code.model';
import type { IPairingCodesRepository } from '../../domain/ports/pairing-codes.port';

/**
 * Expiración diferida de cada código emitido.
 * El barrido periódico cubre los timeouts perdidos por reinicios.
 */
@Injectable()
export class PairingCodeExpiryScheduler implements OnModuleDestroy {
  private readonly logger = new Logger(PairingCodeExpiryScheduler.name);

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(INJECTION_TOKENS.PAIRING_CODES_REPOSITORY)
    private readonly codesRepository: IPairingCodesRepository,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
  ) {}

  schedule(pairingCode: PairingCode): void {
    const name = this.timeoutName(pairingCode.id);
    const delay = Math.max(0, pairingCode.expiresAt.getTime() - this.clock.now().getTime());

    const timeout = setTimeout(() => {
      this.expire(pairingCode.id).catch((error: unknown) => {
        this.logger.error(
          `Error expirando el código ${pairingCode.id}: ${errorMessage(error)}`,
        );
      });
    }, delay);
    timeout.unref();

    this.schedulerRegistry.addTimeout(name, timeout);
  }

  cancel(codeId: string): void {
    const name = this.timeoutName(codeId);
    if (this.schedulerRegistry.doesExist('timeout', name)) {
      this.schedulerRegistry.deleteTimeout(name);
    }
  }

  onModuleDestroy(): void {
    for (const name of this.schedulerRegistry.getTimeouts()) {
      if (name.startsWith('pairing-code-expiry:')) {
        this.schedulerRegistry.deleteTimeout(name);
      }
    }
  }

  private async expire(codeId: string): Promise<void> {
    this.cancel(codeId);
    const expired = await this.codesRepository.markExpired(codeId, this.clock.now());
    if (expired) {
      this.logger.log(`Código ${codeId} expirado`);
    }
  }

  private timeoutName(codeId: string): string {
    return `pairing-code-expiry:${codeId}`;
  }
}
