import { ClsStore } from 'nestjs-cls';

import type { Actor } from '../interfaces/actor.interface';

/**
 * Contexto por request almacenado en nestjs-cls
 */
export interface AppClsStore extends ClsStore {
  // Identificador de la request (header x-request-id o generado)
  requestId: string;

  // Actor autenticado, poblado tras JwtStrategy
  actor?: Actor;
}
