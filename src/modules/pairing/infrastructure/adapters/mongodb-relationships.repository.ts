import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, UpdateQuery } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import type { Relationship } from '../../domain/models/relationship.model';
import type {
  IRelationshipsRepository,
  LivenessSignal,
  MissedHeartbeatsEscalation,
} from '../../domain/ports/relationships.port';
import { RelationshipSchema } from '../schemas/relationship.schema';
import { toRelationship } from './pairing.mappers';

/**
 * Adapter: relaciones padre ↔ hijo en MongoDB
 */
@Injectable()
export class MongoDbRelationshipsRepository implements IRelationshipsRepository {
  private readonly logger = new Logger(MongoDbRelationshipsRepository.name);

  constructor(
    @InjectModel(RelationshipSchema.name)
    private readonly relationshipModel: Model<RelationshipSchema>,
  ) {}

  async findById(id: string): Promise<Relationship | null> {
    return this.findOneMapped({ id }, 'por id');
  }

  async findActive(parentUserId: string, childUserId: string): Promise<Relationship | null> {
    return this.findOneMapped({ parentUserId, childUserId, isActive: true }, 'activa');
  }

  async findActiveByParent(parentUserId: string): Promise<Relationship[]> {
    return this.findMapped({ parentUserId, isActive: true }, 'del padre');
  }

  async findActiveByChild(childUserId: string): Promise<Relationship[]> {
    return this.findMapped({ childUserId, isActive: true }, 'del hijo');
  }

  async applyHeartbeat(signal: LivenessSignal): Promise<number> {
    // Un heartbeat anterior al último cierre ordenado no reabre la sesión
    return this.updateLiveness(
      'heartbeat',
      {
        childUserId: signal.childUserId,
        isActive: true,
        $and: [
          { $or: [{ lastHeartbeatAt: null }, { lastHeartbeatAt: { $lt: signal.at } }] },
          {
            $or: [
              { lastGracefulShutdownAt: null },
              { lastGracefulShutdownAt: { $lte: signal.at } },
            ],
          },
        ],
      },
      {
        $set: {
          lastHeartbeatAt: signal.at,
          missedHeartbeats: 0,
          isNormalClosure: false,
          ...(signal.deviceInfo && { childDeviceInfo: signal.deviceInfo }),
        },
        $max: { lastSyncAt: signal.at },
      },
    );
  }

  async applyShutdown(signal: LivenessSignal): Promise<number> {
    return this.updateLiveness('shutdown', this.syncFilter(signal), {
      $set: {
        isNormalClosure: true,
        missedHeartbeats: 0,
        lastGracefulShutdownAt: signal.at,
        lastSyncAt: signal.at,
        ...(signal.deviceInfo && { childDeviceInfo: signal.deviceInfo }),
      },
    });
  }

  async applySync(signal: LivenessSignal): Promise<number> {
    return this.updateLiveness('sync', this.syncFilter(signal), {
      $set: {
        lastSyncAt: signal.at,
        ...(signal.deviceInfo && { childDeviceInfo: signal.deviceInfo }),
      },
    });
  }

  async findOverdueHeartbeats(cutoff: Date): Promise<Relationship[]> {
    return this.findMapped(
      { isActive: true, isNormalClosure: { $ne: true }, lastHeartbeatAt: { $lt: cutoff } },
      'con heartbeats vencidos',
    );
  }

  async escalateMissedHeartbeats(escalation: MissedHeartbeatsEscalation): Promise<boolean> {
    try {
      const result = await this.relationshipModel
        .updateOne(
          {
            id: escalation.id,
            isActive: true,
            isNormalClosure: { $ne: true },
            missedHeartbeats: escalation.expectedMissedHeartbeats,
            lastHeartbeatAt: escalation.expectedLastHeartbeatAt,
          },
          { $set: { missedHeartbeats: escalation.missedHeartbeats } },
        )
        .exec();
      return result.modifiedCount > 0;
    } catch (error) {
      this.logger.error(
        `Error escalando heartbeats de la relación ${escalation.id}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }

  private syncFilter(signal: LivenessSignal): FilterQuery<RelationshipSchema> {
    return {
      childUserId: signal.childUserId,
      isActive: true,
      $or: [{ lastSyncAt: null }, { lastSyncAt: { $lte: signal.at } }],
    };
  }

  private async updateLiveness(
    kind: string,
    filter: FilterQuery<RelationshipSchema>,
    update: UpdateQuery<RelationshipSchema>,
  ): Promise<number> {
    try {
      const result = await this.relationshipModel.updateMany(filter, update).exec();
      return result.modifiedCount;
    } catch (error) {
      this.logger.error(`Error aplicando ${kind} a relaciones: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async findOneMapped(
    filter: FilterQuery<RelationshipSchema>,
    description: string,
  ): Promise<Relationship | null> {
    try {
      const document = await this.relationshipModel.findOne(filter).exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando relación ${description}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async findMapped(
    filter: FilterQuery<RelationshipSchema>,
    description: string,
  ): Promise<Relationship[]> {
    try {
      const documents = await this.relationshipModel.find(filter).exec();
      return documents.flatMap((document) => {
        const relationship = this.mapOrSkip(document);
        return relationship ? [relationship] : [];
      });
    } catch (error) {
      this.logger.error(`Error listando relaciones ${description}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private mapOrSkip(document: RelationshipSchema): Relationship | null {
    const relationship = toRelationship(document);
    if (!relationship) {
      this.logger.warn(`Relación con formato inválido ignorada: ${document.id}`);
    }
    return relationship;
  }
}
