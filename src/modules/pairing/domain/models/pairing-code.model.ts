import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';

/**
 * Código de emparejamiento de 6 dígitos emitido por el dispositivo hijo.
 * Ciclo de vida: issued → active (consumido) | expired. Nunca se reactiva.
 */
export interface PairingCode {
  id: string;
  code: string;
  childUserId: string;
  childName: string;
  deviceName: string;
  deviceInfo?: DeviceInfo;
  createdAt: Date;
  expiresAt: Date;
  isActive: boolean;
  isExpired: boolean;
  parentUserId?: string;
  pairedAt?: Date;
  cleanedUpAt?: Date;
}
