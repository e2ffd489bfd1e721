import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';
import type { ActivityType } from '../../../heartbeats/domain/models/activity-type';
import type { UserProfile, UserType } from '../models/user-profile.model';

export interface ProfileActivity {
  userId: string;
  activityType: ActivityType;
  deviceInfo?: DeviceInfo;
  at: Date;
}

/**
 * Puerto: persistencia de perfiles de usuario
 * Implementación: MongoDB adapter
 */
export interface IUserProfilesRepository {
  findById(id: string): Promise<UserProfile | null>;

  /**
   * Crea el perfil si no existe; nunca cambia el tipo de uno existente
   */
  ensureProfile(id: string, userType: UserType): Promise<void>;

  /**
   * Registra actividad solo si `at` no es anterior a la última registrada.
   * Devuelve false si había una actividad más reciente.
   */
  recordActivity(activity: ProfileActivity): Promise<boolean>;

  /**
   * Hijos cuya última actividad es anterior a `before`
   */
  findInactiveChildren(before: Date): Promise<UserProfile[]>;
}
