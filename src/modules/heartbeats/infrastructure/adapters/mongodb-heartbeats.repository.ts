import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import { isDuplicateKeyError } from '../../../../common/errors/mongo-errors';
import { isActivityType } from '../../domain/models/activity-type';
import type { HeartbeatRecord } from '../../domain/models/heartbeat-record.model';
import type { IHeartbeatsRepository } from '../../domain/ports/heartbeats.port';
import { HeartbeatSchema } from '../schemas/heartbeat.schema';

@Injectable()
export class MongoDbHeartbeatsRepository implements IHeartbeatsRepository {
  private readonly logger = new Logger(MongoDbHeartbeatsRepository.name);

  constructor(
    @InjectModel(HeartbeatSchema.name)
    private readonly heartbeatModel: Model<HeartbeatSchema>,
  ) {}

  async upsertIfNewer(record: HeartbeatRecord): Promise<boolean> {
    try {
      const result = await this.heartbeatModel
        .updateOne(
          {
            childUserId: record.childUserId,
            $or: [{ timestamp: null }, { timestamp: { $lt: record.timestamp } }],
          },
          {
            $set: {
              timestamp: record.timestamp,
              activityType: record.activityType,
              isActive: record.isActive,
              ...(record.deviceInfo && { deviceInfo: record.deviceInfo }),
            },
          },
          { upsert: true },
        )
        .exec();
      return result.modifiedCount > 0 || result.upsertedCount > 0;
    } catch (error) {
      // Ya existe un registro igual o más reciente: el upsert choca con childUserId único
      if (isDuplicateKeyError(error)) {
        return false;
      }
      this.logger.error(
        `Error guardando heartbeat de ${record.childUserId}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }

  async findByChild(childUserId: string): Promise<HeartbeatRecord | null> {
    try {
      const document = await this.heartbeatModel.findOne({ childUserId }).exec();
      return document ? this.mapToDomain(document) : null;
    } catch (error) {
      this.logger.error(`Error leyendo heartbeat de ${childUserId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private mapToDomain(document: HeartbeatSchema): HeartbeatRecord | null {
    if (!(document.timestamp instanceof Date) || !isActivityType(document.activityType)) {
      this.logger.warn(`Heartbeat con formato inválido ignorado: ${document.childUserId}`);
      return null;
    }

    return {
      childUserId: document.childUserId,
      timestamp: document.timestamp,
      activityType: document.activityType,
      isActive: document.isActive === true,
      deviceInfo: document.deviceInfo,
    };
  }
}
