import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';
import type { ActivityType } from './activity-type';

/**
 * Última señal conocida de un hijo (un registro por hijo)
 */
export interface HeartbeatRecord {
  childUserId: string;
  timestamp: Date;
  activityType: ActivityType;
  isActive: boolean;
  deviceInfo?: DeviceInfo;
}
