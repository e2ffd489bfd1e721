import type { BedtimeSettings } from '../models/bedtime-settings.model';

export interface IBedtimeSettingsRepository {
  findByUser(userId: string): Promise<BedtimeSettings | null>;

  /**
   * Upsert; se ignora si lo almacenado es más reciente que `settings.updatedAt`
   */
  save(settings: BedtimeSettings): Promise<boolean>;

  findEnabled(): Promise<BedtimeSettings[]>;
}
