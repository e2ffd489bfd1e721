import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';
import type { Relationship } from '../models/relationship.model';

export interface LivenessSignal {
  childUserId: string;
  at: Date;
  deviceInfo?: DeviceInfo;
}

export interface MissedHeartbeatsEscalation {
  id: string;
  expectedMissedHeartbeats: number;
  expectedLastHeartbeatAt: Date;
  missedHeartbeats: number;
}

/**
 * Puerto: relaciones padre ↔ hijo.
 * Las escrituras de liveness son compare-and-set sobre timestamps:
 * una señal más antigua que la almacenada no modifica nada.
 */
export interface IRelationshipsRepository {
  findById(id: string): Promise<Relationship | null>;

  findActive(parentUserId: string, childUserId: string): Promise<Relationship | null>;

  findActiveByParent(parentUserId: string): Promise<Relationship[]>;

  findActiveByChild(childUserId: string): Promise<Relationship[]>;

  /**
   * Heartbeat explícito: lastHeartbeatAt, missedHeartbeats = 0, isNormalClosure = false
   */
  applyHeartbeat(signal: LivenessSignal): Promise<number>;

  /**
   * Cierre ordenado: isNormalClosure = true, missedHeartbeats = 0
   */
  applyShutdown(signal: LivenessSignal): Promise<number>;

  /**
   * Resto de actividades: lastSyncAt y childDeviceInfo
   */
  applySync(signal: LivenessSignal): Promise<number>;

  /**
   * Relaciones activas, sin cierre ordenado, con último heartbeat anterior a `cutoff`
   */
  findOverdueHeartbeats(cutoff: Date): Promise<Relationship[]>;

  /**
   * Persiste el nuevo contador solo si nadie lo cambió desde la lectura
   */
  escalateMissedHeartbeats(escalation: MissedHeartbeatsEscalation): Promise<boolean>;
}
