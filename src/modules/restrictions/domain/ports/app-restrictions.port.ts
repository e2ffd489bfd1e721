import type { AppRestriction } from '../models/app-restriction.model';

/**
 * Puerto: restricciones por app
 * Implementación: MongoDB adapter
 */
export interface IAppRestrictionsRepository {
  find(parentId: string, bundleId: string): Promise<AppRestriction | null>;

  findByParent(parentId: string): Promise<AppRestriction[]>;

  /**
   * Restricciones bloqueadas hoy por haber superado el límite
   */
  findLimitBlocked(): Promise<AppRestriction[]>;

  /**
   * Alta; false si otra escritura creó antes la misma (parentId, bundleId)
   */
  create(restriction: AppRestriction): Promise<boolean>;

  /**
   * Sustituye solo si la versión almacenada sigue siendo `expectedVersion`.
   * La versión guardada pasa a ser `restriction.version`.
   */
  replace(restriction: AppRestriction, expectedVersion: number): Promise<boolean>;

  delete(parentId: string, bundleId: string): Promise<boolean>;
}
