import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import type {
  DetectionResolution,
  NewAppDetection,
} from '../../domain/models/new-app-detection.model';
import type { INewAppDetectionsRepository } from '../../domain/ports/new-app-detections.port';
import { NewAppDetectionSchema } from '../schemas/new-app-detection.schema';
import { toNewAppDetection } from './restrictions.mappers';

@Injectable()
export class MongoDbNewAppDetectionsRepository implements INewAppDetectionsRepository {
  private readonly logger = new Logger(MongoDbNewAppDetectionsRepository.name);

  constructor(
    @InjectModel(NewAppDetectionSchema.name)
    private readonly detectionModel: Model<NewAppDetectionSchema>,
  ) {}

  async findById(id: string): Promise<NewAppDetection | null> {
    try {
      const document = await this.detectionModel.findOne({ id }).exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando detección ${id}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findPendingByParent(parentId: string): Promise<NewAppDetection[]> {
    try {
      const documents = await this.detectionModel
        .find({ parentId, isProcessed: false })
        .sort({ detectedAt: -1 })
        .exec();
      return documents.flatMap((document) => {
        const detection = this.mapOrSkip(document);
        return detection ? [detection] : [];
      });
    } catch (error) {
      this.logger.error(`Error listando detecciones de ${parentId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findDetectedBundleIds(parentId: string): Promise<string[]> {
    try {
      return await this.detectionModel.distinct('bundleId', { parentId }).exec();
    } catch (error) {
      this.logger.error(`Error listando apps detectadas de ${parentId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async createIfAbsent(detection: NewAppDetection): Promise<boolean> {
    try {
      const result = await this.detectionModel
        .updateOne(
          { id: detection.id },
          {
            $setOnInsert: {
              parentId: detection.parentId,
              deviceId: detection.deviceId,
              bundleId: detection.bundleId,
              appName: detection.appName,
              detectedAt: detection.detectedAt,
              isProcessed: false,
            },
          },
          { upsert: true },
        )
        .exec();
      return result.upsertedCount > 0;
    } catch (error) {
      this.logger.error(`Error guardando detección ${detection.id}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async markProcessed(
    id: string,
    resolution: DetectionResolution,
    processedAt: Date,
  ): Promise<NewAppDetection | null> {
    try {
      const document = await this.detectionModel
        .findOneAndUpdate(
          { id, isProcessed: false },
          { $set: { isProcessed: true, resolution, processedAt } },
          { new: true },
        )
        .exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error procesando detección ${id}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private mapOrSkip(document: NewAppDetectionSchema): NewAppDetection | null {
    const detection = toNewAppDetection(document);
    if (!detection) {
      this.logger.warn(`Detección con formato inválido ignorada: ${document.id}`);
    }
    return detection;
  }
}
