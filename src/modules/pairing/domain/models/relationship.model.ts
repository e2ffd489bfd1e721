import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';

/**
 * Vínculo padre ↔ hijo. `isActive = false` es terminal:
 * volver a emparejar crea una relación nueva.
 */
export interface Relationship {
  id: string;
  parentUserId: string;
  childUserId: string;
  childName: string;
  deviceName: string;
  pairingCode: string;
  createdAt: Date;
  isActive: boolean;
  lastSyncAt?: Date;
  lastHeartbeatAt?: Date;
  missedHeartbeats: number;
  isNormalClosure: boolean;
  childDeviceInfo?: DeviceInfo;
  unlinkedAt?: Date;
  unlinkedBy?: string;
  lastGracefulShutdownAt?: Date;
}
