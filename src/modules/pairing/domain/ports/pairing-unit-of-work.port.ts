import type { PairingCode } from '../models/pairing-code.model';
import type { Relationship } from '../models/relationship.model';

export interface PairingCommit {
  pairingCode: PairingCode;
  relationship: Relationship;
  pairedAt: Date;
}

export type PairingCommitResult =
  | { status: 'committed'; relationship: Relationship }
  | { status: 'code_consumed' }
  | { status: 'already_paired' };

export interface UnpairCommit {
  relationshipId: string;
  unlinkedBy: string;
  unlinkedAt: Date;
}

/**
 * Puerto: escrituras multi-documento del emparejamiento.
 * Consumo del código, alta de la relación y perfil del hijo se aplican
 * juntos o no se aplican.
 */
export interface IPairingUnitOfWork {
  commitPairing(commit: PairingCommit): Promise<PairingCommitResult>;

  /**
   * Devuelve la relación desactivada, o null si ya no estaba activa
   */
  commitUnpair(commit: UnpairCommit): Promise<Relationship | null>;
}
