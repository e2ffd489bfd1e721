import type { HeartbeatRecord } from '../models/heartbeat-record.model';

/**
 * Puerto: último heartbeat por hijo
 * Implementación: MongoDB adapter
 */
export interface IHeartbeatsRepository {
  /**
   * Sustituye el registro solo si `record.timestamp` es posterior al almacenado
   */
  upsertIfNewer(record: HeartbeatRecord): Promise<boolean>;

  findByChild(childUserId: string): Promise<HeartbeatRecord | null>;
}
