import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, UpdateQuery } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import { isDuplicateKeyError } from '../../../../common/errors/mongo-errors';
import type { AppRestriction } from '../../domain/models/app-restriction.model';
import type { IAppRestrictionsRepository } from '../../domain/ports/app-restrictions.port';
import { AppRestrictionSchema } from '../schemas/app-restriction.schema';
import { toAppRestriction } from './restrictions.mappers';

/**
 * Adapter: restricciones por app en MongoDB
 */
@Injectable()
export class MongoDbAppRestrictionsRepository implements IAppRestrictionsRepository {
  private readonly logger = new Logger(MongoDbAppRestrictionsRepository.name);

  constructor(
    @InjectModel(AppRestrictionSchema.name)
    private readonly restrictionModel: Model<AppRestrictionSchema>,
  ) {}

  async find(parentId: string, bundleId: string): Promise<AppRestriction | null> {
    try {
      const document = await this.restrictionModel.findOne({ parentId, bundleId }).exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando restricción ${parentId}/${bundleId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findByParent(parentId: string): Promise<AppRestriction[]> {
    try {
      const documents = await this.restrictionModel
        .find({ parentId })
        .sort({ bundleId: 1 })
        .exec();
      return documents.flatMap((document) => {
        const restriction = this.mapOrSkip(document);
        return restriction ? [restriction] : [];
      });
    } catch (error) {
      this.logger.error(`Error listando restricciones de ${parentId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findLimitBlocked(): Promise<AppRestriction[]> {
    try {
      const documents = await this.restrictionModel
        .find({ limitExceededAt: { $exists: true } })
        .exec();
      return documents.flatMap((document) => {
        const restriction = this.mapOrSkip(document);
        return restriction ? [restriction] : [];
      });
    } catch (error) {
      this.logger.error(`Error listando restricciones bloqueadas por límite: ${errorMessage(error)}`);
      throw error;
    }
  }

  async create(restriction: AppRestriction): Promise<boolean> {
    try {
      await this.restrictionModel.create({ ...restriction });
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return false;
      }
      this.logger.error(
        `Error creando restricción ${restriction.parentId}/${restriction.bundleId}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }

  async replace(restriction: AppRestriction, expectedVersion: number): Promise<boolean> {
    const fields = {
      timeLimit: restriction.timeLimit,
      isDisabled: restriction.isDisabled,
      dailyUsage: restriction.dailyUsage,
      lastResetDate: restriction.lastResetDate,
      timezone: restriction.timezone,
      version: restriction.version,
      updatedAt: restriction.updatedAt,
    };
    const update: UpdateQuery<AppRestrictionSchema> = restriction.limitExceededAt
      ? { $set: { ...fields, limitExceededAt: restriction.limitExceededAt } }
      : { $set: fields, $unset: { limitExceededAt: 1 } };

    try {
      const result = await this.restrictionModel
        .updateOne(
          {
            parentId: restriction.parentId,
            bundleId: restriction.bundleId,
            version: expectedVersion,
          },
          update,
        )
        .exec();
      return result.matchedCount > 0;
    } catch (error) {
      this.logger.error(
        `Error actualizando restricción ${restriction.parentId}/${restriction.bundleId}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }

  async delete(parentId: string, bundleId: string): Promise<boolean> {
    try {
      const result = await this.restrictionModel.deleteOne({ parentId, bundleId }).exec();
      return result.deletedCount > 0;
    } catch (error) {
      this.logger.error(`Error eliminando restricción ${parentId}/${bundleId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private mapOrSkip(document: AppRestrictionSchema): AppRestriction | null {
    const restriction = toAppRestriction(document);
    if (!restriction) {
      this.logger.warn(`Restricción con formato inválido ignorada: ${document.id}`);
    }
    return restriction;
  }
}
