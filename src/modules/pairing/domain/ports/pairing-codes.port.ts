import type { PairingCode } from '../models/pairing-code.model';

/**
 * Puerto: persistencia de códigos de emparejamiento
 * Implementación: MongoDB adapter
 */
export interface IPairingCodesRepository {
  create(pairingCode: PairingCode): Promise<PairingCode>;

  /**
   * Código sin consumir y sin marcar como expirado (puede haber vencido ya)
   */
  findAvailable(code: string): Promise<PairingCode | null>;

  /**
   * Último registro consumido con ese código
   */
  findLatestConsumed(code: string): Promise<PairingCode | null>;

  /**
   * Último registro sin consumir con ese código, esté o no expirado
   */
  findLatestUnconsumed(code: string): Promise<PairingCode | null>;

  /**
   * Último registro con ese código emitido por el hijo
   */
  findLatestForChild(code: string, childUserId: string): Promise<PairingCode | null>;

  /**
   * Marca como expirado solo si sigue disponible. Idempotente.
   */
  markExpired(id: string, at: Date): Promise<boolean>;

  /**
   * Barrido: expira los disponibles con expiresAt < now
   */
  expireOverdue(now: Date): Promise<number>;

  deleteCreatedBefore(cutoff: Date): Promise<number>;
}
