import { Injectable } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';

import type { Actor } from '../interfaces/actor.interface';
import type { AppClsStore } from './cls-store.interface';

/**
 * AsyncContextService: adapter tipado sobre ClsService<AppClsStore>.
 *
 * nestjs-cls propaga el contexto por todas las operaciones async,
 * incluidos interceptores, guardias y listeners síncronos de eventos.
 */
@Injectable()
export class AsyncContextService {
  constructor(private readonly cls: ClsService<AppClsStore>) {}

  setRequestId(requestId: string): void {
    this.cls.set('requestId', requestId);
  }

  setActor(actor: Actor): void {
    this.cls.set('actor', actor);
  }

  /**
   * Fuera de una request (tareas programadas) no hay contexto activo
   */
  getRequestId(): string {
    if (!this.cls.isActive()) {
      return 'system';
    }
    return this.cls.get('requestId') ?? this.cls.getId() ?? 'unknown';
  }

  getActor(): Actor | undefined {
    if (!this.cls.isActive()) {
      return undefined;
    }
    return this.cls.get('actor');
  }

  getActorId(): string | undefined {
    return this.getActor()?.actorId;
  }
}
