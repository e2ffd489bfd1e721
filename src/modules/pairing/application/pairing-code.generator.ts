import { Injectable } from '@nestjs/common';
import { randomInt } from 'crypto';

import {
  PAIRING_CODE_GENERATION_ATTEMPTS,
  PAIRING_CODE_LENGTH,
} from '../domain/constants/pairing.constants';

/**
 * Genera códigos numéricos de 6 dígitos con distribución uniforme.
 * La unicidad entre códigos disponibles se intenta, no se garantiza.
 */
@Injectable()
export class PairingCodeGenerator {
  async generate(isTaken: (candidate: string) => Promise<boolean>): Promise<string> {
    let candidate = this.nextCandidate();
    for (let attempt = 1; attempt <= PAIRING_CODE_GENERATION_ATTEMPTS; attempt++) {
      if (!(await isTaken(candidate))) {
        return candidate;
      }
      if (attempt < PAIRING_CODE_GENERATION_ATTEMPTS) {
        candidate = this.nextCandidate();
      }
    }
    // Colisión improbable y aceptada: el código se emite igualmente
    return candidate;
  }

  nextCandidate(): string {
    return randomInt(0, 10 ** PAIRING_CODE_LENGTH)
      .toString()
      .padStart(PAIRING_CODE_LENGTH, '0');
  }
}
