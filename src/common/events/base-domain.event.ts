import { randomUUID } from 'crypto';

/**
 * Abstract base class for all domain events.
 * Provides versioning, timestamping, and request tracing.
 *
 * `eventName` es la clave con la que se emite por EventEmitter2,
 * así emisores y listeners comparten la misma constante.
 */
export abstract class BaseDomainEvent {
  /**
   * Event schema version for versioning support
   */
  public readonly version: number = 1;

  /**
   * Momento de negocio en que ocurrió el hecho (reloj inyectado, no el de emisión)
   */
  public readonly timestamp: Date;

  /**
   * Unique identifier for this event instance
   */
  public readonly eventId: string;

  /**
   * Request ID for tracing (from nestjs-cls)
   */
  public readonly requestId?: string;

  abstract readonly eventName: string;

  constructor(occurredAt: Date, requestId?: string) {
    this.timestamp = occurredAt;
    this.eventId = randomUUID();
    this.requestId = requestId;
  }
}
