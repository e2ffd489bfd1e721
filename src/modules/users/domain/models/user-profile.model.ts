import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';
import type { ActivityType } from '../../../heartbeats/domain/models/activity-type';

export type UserType = 'parent' | 'child';

export const USER_TYPES: readonly UserType[] = ['parent', 'child'];

/**
 * Perfil de supervisión de un usuario. La identidad (email, credenciales)
 * vive en el proveedor externo; aquí solo el estado de emparejamiento y actividad.
 */
export interface UserProfile {
  id: string;
  userType: UserType;
  isDevicePaired: boolean;
  pairedWithParent?: string;
  pairedAt?: Date;
  unlinkedAt?: Date;
  lastActiveAt?: Date;
  lastActivityType?: ActivityType;
  deviceInfo?: DeviceInfo;
}
