import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import { isDuplicateKeyError } from '../../../../common/errors/mongo-errors';
import type { BedtimeSettings } from '../../domain/models/bedtime-settings.model';
import type { IBedtimeSettingsRepository } from '../../domain/ports/bedtime-settings.port';
import { BedtimeSettingsSchema } from '../schemas/bedtime-settings.schema';
import { toBedtimeSettings } from './restrictions.mappers';

@Injectable()
export class MongoDbBedtimeSettingsRepository implements IBedtimeSettingsRepository {
  private readonly logger = new Logger(MongoDbBedtimeSettingsRepository.name);

  constructor(
    @InjectModel(BedtimeSettingsSchema.name)
    private readonly settingsModel: Model<BedtimeSettingsSchema>,
  ) {}

  async findByUser(userId: string): Promise<BedtimeSettings | null> {
    try {
      const document = await this.settingsModel.findOne({ userId }).exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando horario de ${userId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async save(settings: BedtimeSettings): Promise<boolean> {
    try {
      const result = await this.settingsModel
        .updateOne(
          {
            userId: settings.userId,
            $or: [{ updatedAt: null }, { updatedAt: { $lte: settings.updatedAt } }],
          },
          {
            $set: {
              isEnabled: settings.isEnabled,
              startTime: settings.startTime,
              endTime: settings.endTime,
              enabledDays: settings.enabledDays,
              timezone: settings.timezone,
              updatedAt: settings.updatedAt,
            },
          },
          { upsert: true },
        )
        .exec();
      return result.matchedCount > 0 || result.upsertedCount > 0;
    } catch (error) {
      // Hay una versión más reciente: el upsert choca con userId único
      if (isDuplicateKeyError(error)) {
        return false;
      }
      this.logger.error(`Error guardando horario de ${settings.userId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findEnabled(): Promise<BedtimeSettings[]> {
    try {
      const documents = await this.settingsModel.find({ isEnabled: true }).exec();
      return documents.flatMap((document) => {
        const settings = this.mapOrSkip(document);
        return settings ? [settings] : [];
      });
    } catch (error) {
      this.logger.error(`Error listando horarios activos: ${errorMessage(error)}`);
      throw error;
    }
  }

  private mapOrSkip(document: BedtimeSettingsSchema): BedtimeSettings | null {
    const settings = toBedtimeSettings(document);
    if (!settings) {
      this.logger.warn(`Horario con formato inválido ignorado: ${document.userId}`);
    }
    return settings;
  }
}
