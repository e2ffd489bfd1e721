import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { v4 as uuidv4 } from 'uuid';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  DomainError,
  errorMessage,
  failFromError,
} from '../../../common/errors/domain.error';
import type { IClock } from '../../../common/interfaces/clock.interface';
import { ApiResponse } from '../../../common/types/api-response.type';
import type { IUserProfilesRepository } from '../../users/domain/ports/user-profiles.port';
import {
  CHILD_ONLINE_WINDOW_MS,
  PAIRING_CODE_PATTERN,
  PAIRING_CODE_TTL_MS,
  PAIRING_COMMIT_ATTEMPTS,
  PAIRING_EVENTS,
  PAIRING_INJECTION_TOKENS,
} from '../domain/constants/pairing.constants';
import {
  RelationshipCreatedEvent,
  RelationshipUnlinkedEvent,
} from '../domain/events/pairing.events';
import type { PairingCode } from '../domain/models/pairing-code.model';
import type { Relationship } from '../domain/models/relationship.model';
import type { IPairingCodesRepository } from '../domain/ports/pairing-codes.port';
import type { IPairingUnitOfWork } from '../domain/ports/pairing-unit-of-work.port';
import type { IRelationshipsRepository } from '../domain/ports/relationships.port';
import {
  pairingCodeStateOf,
  transitionPairingCode,
} from '../domain/state-machines/pairing-code.state-machine';
import type {
  GenerateCodeDto,
  GeneratedCodeDto,
  PairedChildDto,
  PairingCodeStatusDto,
  PairingResultDto,
} from '../dto/pairing.dto';
import { PairingCodeExpiryScheduler } from '../infrastructure/schedulers/pairing-code-expiry.scheduler';
import { PairingCodeGenerator } from './pairing-code.generator';

/**
 * Protocolo de emparejamiento padre ↔ hijo.
 *
 * - El hijo emite un código de 6 dígitos válido 10 minutos
 * - El padre lo envía; consumo, relación y perfil se confirman en una transacción
 * - Cualquiera de las dos partes puede desvincular (irreversible)
 */
@Injectable()
export class PairingService {
  private readonly logger = new Logger(PairingService.name);

  constructor(
    @Inject(INJECTION_TOKENS.PAIRING_CODES_REPOSITORY)
    private readonly codesRepository: IPairingCodesRepository,
    @Inject(INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY)
    private readonly relationshipsRepository: IRelationshipsRepository,
    @Inject(INJECTION_TOKENS.USER_PROFILES_REPOSITORY)
    private readonly profilesRepository: IUserProfilesRepository,
    @Inject(PAIRING_INJECTION_TOKENS.PAIRING_UNIT_OF_WORK)
    private readonly unitOfWork: IPairingUnitOfWork,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
    private readonly codeGenerator: PairingCodeGenerator,
    private readonly expiryScheduler: PairingCodeExpiryScheduler,
    private readonly asyncContextService: AsyncContextService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Emite un código para el hijo autenticado
   */
  async generateCode(dto: GenerateCodeDto): Promise<ApiResponse<GeneratedCodeDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const childUserId = this.requireActorId();
      const childName = dto.childName.trim();
      const deviceName = dto.deviceName.trim();
      if (!childName || !deviceName) {
        throw new DomainError(
          'INVALID_FORMAT',
          'El nombre del hijo y del dispositivo son obligatorios.',
        );
      }

      await this.profilesRepository.ensureProfile(childUserId, 'child');

      const code = await this.codeGenerator.generate(
        async (candidate) => (await this.codesRepository.findAvailable(candidate)) !== null,
      );

      const now = this.clock.now();
      const pairingCode = await this.codesRepository.create({
        id: uuidv4(),
        code,
        childUserId,
        childName,
        deviceName,
        deviceInfo: dto.deviceInfo,
        createdAt: now,
        expiresAt: new Date(now.getTime() + PAIRING_CODE_TTL_MS),
        isActive: false,
        isExpired: false,
      });

      this.expiryScheduler.schedule(pairingCode);

      this.logger.log(`[${requestId}] Código emitido para el hijo ${childUserId}`);
      return ApiResponse.ok<GeneratedCodeDto>(
        HttpStatus.CREATED,
        {
          code: pairingCode.code,
          expiresAt: pairingCode.expiresAt,
          expiresInSeconds: PAIRING_CODE_TTL_MS / 1000,
        },
        'Código de emparejamiento generado',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error generando código: ${errorMessage(error)}`);
      return failFromError<GeneratedCodeDto>(error, { requestId });
    }
  }

  /**
   * El padre autenticado envía el código mostrado en el dispositivo del hijo
   */
  async pair(code: string): Promise<ApiResponse<PairingResultDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentUserId = this.requireActorId();
      const relationship = await this.pairWithCode(code, parentUserId);

      this.eventEmitter.emit(
        PAIRING_EVENTS.RELATIONSHIP_CREATED,
        new RelationshipCreatedEvent(
          relationship.id,
          relationship.parentUserId,
          relationship.childUserId,
          relationship.childName,
          relationship.deviceName,
          relationship.createdAt,
          requestId,
        ),
      );

      this.logger.log(
        `[${requestId}] Relación ${relationship.id} creada: padre ${parentUserId} ↔ hijo ${relationship.childUserId}`,
      );
      return ApiResponse.ok<PairingResultDto>(
        HttpStatus.CREATED,
        {
          relationshipId: relationship.id,
          childUserId: relationship.childUserId,
          childName: relationship.childName,
          deviceName: relationship.deviceName,
        },
        'Dispositivo emparejado correctamente',
        { requestId },
      );
    } catch (error) {
      this.logger.warn(`[${requestId}] Emparejamiento rechazado: ${errorMessage(error)}`);
      return failFromError<PairingResultDto>(error, { requestId });
    }
  }

  /**
   * Desvincula una relación activa. Solo el padre o el hijo de la relación.
   */
  async unpair(relationshipId: string): Promise<ApiResponse> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const requestingUserId = this.requireActorId();

      const relationship = await this.relationshipsRepository.findById(relationshipId);
      if (!relationship || !relationship.isActive) {
        throw new DomainError('NOT_FOUND', 'La relación no existe o ya fue desvinculada.');
      }
      if (
        relationship.parentUserId !== requestingUserId &&
        relationship.childUserId !== requestingUserId
      ) {
        throw new DomainError('PERMISSION_DENIED');
      }

      const unlinkedAt = this.clock.now();
      const unlinked = await this.unitOfWork.commitUnpair({
        relationshipId,
        unlinkedBy: requestingUserId,
        unlinkedAt,
      });
      if (!unlinked) {
        throw new DomainError('NOT_FOUND', 'La relación no existe o ya fue desvinculada.');
      }

      this.eventEmitter.emit(
        PAIRING_EVENTS.RELATIONSHIP_UNLINKED,
        new RelationshipUnlinkedEvent(
          unlinked.id,
          unlinked.parentUserId,
          unlinked.childUserId,
          unlinked.childName,
          requestingUserId,
          unlinkedAt,
          requestId,
        ),
      );

      this.logger.log(`[${requestId}] Relación ${relationshipId} desvinculada por ${requestingUserId}`);
      return ApiResponse.ok(HttpStatus.OK, undefined, 'Dispositivo desvinculado', { requestId });
    } catch (error) {
      this.logger.warn(`[${requestId}] Error desvinculando ${relationshipId}: ${errorMessage(error)}`);
      return failFromError(error, { requestId });
    }
  }

  /**
   * Hijos emparejados con el padre autenticado
   */
  async listChildren(): Promise<ApiResponse<PairedChildDto[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentUserId = this.requireActorId();
      const relationships = await this.relationshipsRepository.findActiveByParent(parentUserId);
      const now = this.clock.now().getTime();

      const children = relationships
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
        .map<PairedChildDto>((relationship) => ({
          relationshipId: relationship.id,
          childUserId: relationship.childUserId,
          childName: relationship.childName,
          deviceName: relationship.deviceName,
          pairedAt: relationship.createdAt,
          lastSyncAt: relationship.lastSyncAt,
          isOnline:
            relationship.lastSyncAt !== undefined &&
            now - relationship.lastSyncAt.getTime() < CHILD_ONLINE_WINDOW_MS,
        }));

      return ApiResponse.ok<PairedChildDto[]>(HttpStatus.OK, children, 'Hijos emparejados', {
        requestId,
        total: children.length,
      });
    } catch (error) {
      this.logger.error(`[${requestId}] Error listando hijos: ${errorMessage(error)}`);
      return failFromError<PairedChildDto[]>(error, { requestId });
    }
  }

  /**
   * El hijo consulta si su código ya fue consumido o expiró
   */
  async getCodeStatus(code: string): Promise<ApiResponse<PairingCodeStatusDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const childUserId = this.requireActorId();
      if (!PAIRING_CODE_PATTERN.test(code)) {
        throw new DomainError('INVALID_FORMAT');
      }

      const pairingCode = await this.codesRepository.findLatestForChild(code, childUserId);
      if (!pairingCode) {
        throw new DomainError('CODE_NOT_FOUND');
      }

      return ApiResponse.ok<PairingCodeStatusDto>(
        HttpStatus.OK,
        {
          code: pairingCode.code,
          status: pairingCodeStateOf(pairingCode, this.clock.now()),
          expiresAt: pairingCode.expiresAt,
          pairedAt: pairingCode.pairedAt,
        },
        'Estado del código',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error consultando código: ${errorMessage(error)}`);
      return failFromError<PairingCodeStatusDto>(error, { requestId });
    }
  }

  private async pairWithCode(
    code: string,
    parentUserId: string,
    attempt = 1,
  ): Promise<Relationship> {
    if (!PAIRING_CODE_PATTERN.test(code)) {
      throw new DomainError('INVALID_FORMAT');
    }

    const pairingCode = await this.codesRepository.findAvailable(code);
    if (!pairingCode) {
      throw await this.unavailableCodeError(code, parentUserId);
    }

    // El plazo se comprueba aunque el barrido aún no lo haya marcado
    const now = this.clock.now();
    const state = transitionPairingCode(pairingCodeStateOf(pairingCode, now), {
      type: 'CONSUME',
    });
    if (state !== 'active') {
      throw new DomainError('CODE_EXPIRED');
    }

    const existing = await this.relationshipsRepository.findActive(
      parentUserId,
      pairingCode.childUserId,
    );
    if (existing) {
      throw new DomainError('ALREADY_PAIRED');
    }

    const result = await this.unitOfWork.commitPairing({
      pairingCode,
      relationship: this.newRelationship(pairingCode, parentUserId, now),
      pairedAt: now,
    });

    switch (result.status) {
      case 'committed':
        this.expiryScheduler.cancel(pairingCode.id);
        return result.relationship;
      case 'already_paired':
        throw new DomainError('ALREADY_PAIRED');
      case 'code_consumed':
        // Otra request consumió el código entre la lectura y el commit
        if (attempt >= PAIRING_COMMIT_ATTEMPTS) {
          throw new DomainError('CODE_NOT_FOUND');
        }
        return this.pairWithCode(code, parentUserId, attempt + 1);
    }
  }

  /**
   * Sin código disponible: si ya lo consumió este mismo padre es un doble envío;
   * si el temporizador o el barrido ya lo marcaron, sigue siendo CODE_EXPIRED
   */
  private async unavailableCodeError(code: string, parentUserId: string): Promise<DomainError> {
    const consumed = await this.codesRepository.findLatestConsumed(code);
    if (consumed) {
      const existing = await this.relationshipsRepository.findActive(
        parentUserId,
        consumed.childUserId,
      );
      if (existing) {
        return new DomainError('ALREADY_PAIRED');
      }
    }

    const unconsumed = await this.codesRepository.findLatestUnconsumed(code);
    if (unconsumed && pairingCodeStateOf(unconsumed, this.clock.now()) === 'expired') {
      return new DomainError('CODE_EXPIRED');
    }
    return new DomainError('CODE_NOT_FOUND');
  }

  private newRelationship(
    pairingCode: PairingCode,
    parentUserId: string,
    now: Date,
  ): Relationship {
    return {
      id: uuidv4(),
      parentUserId,
      childUserId: pairingCode.childUserId,
      childName: pairingCode.childName,
      deviceName: pairingCode.deviceName,
      pairingCode: pairingCode.code,
      createdAt: now,
      isActive: true,
      lastSyncAt: now,
      missedHeartbeats: 0,
      isNormalClosure: false,
      childDeviceInfo: pairingCode.deviceInfo,
    };
  }

  private requireActorId(): string {
    const actorId = this.asyncContextService.getActorId();
    if (!actorId) {
      throw new DomainError('UNAUTHENTICATED');
    }
    return actorId;
  }
}
