import type { AppRestriction } from '../models/app-restriction.model';
import type { BedtimeSettings } from '../models/bedtime-settings.model';

export type DeviceAppRestriction = Pick<
  AppRestriction,
  'bundleId' | 'timeLimit' | 'isDisabled' | 'dailyUsage' | 'lastResetDate'
>;

export type DeviceBedtime = Pick<
  BedtimeSettings,
  'isEnabled' | 'startTime' | 'endTime' | 'enabledDays' | 'timezone'
> & { isActiveNow: boolean };

/**
 * Estado de restricciones de un padre tal como lo lee el dispositivo hijo
 */
export interface DeviceScope {
  parentId: string;
  appRestrictions: DeviceAppRestriction[];
  bedtime: DeviceBedtime | null;
}

/**
 * Puerto: estado empujado a los dispositivos, por ámbito de padre.
 * Cada entrada lleva `updatedAt`; gana la escritura más reciente.
 * `null` borra la entrada (queda una marca para que un push antiguo no la resucite).
 */
export interface IDeviceStateCache {
  pushAppRestriction(
    parentId: string,
    bundleId: string,
    payload: DeviceAppRestriction | null,
    updatedAt: Date,
  ): Promise<boolean>;

  pushBedtime(parentId: string, payload: DeviceBedtime | null, updatedAt: Date): Promise<boolean>;

  /**
   * Entradas presentes del ámbito; null si no tiene ninguna.
   * Solo es completo si el ámbito fue reconstruido (`isWarm`).
   */
  readScope(parentId: string): Promise<DeviceScope | null>;

  /**
   * Marca el ámbito como reconstruido desde el almacén
   */
  markWarm(parentId: string): Promise<void>;

  isWarm(parentId: string): Promise<boolean>;
}
