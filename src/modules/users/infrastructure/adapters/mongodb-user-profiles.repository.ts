import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import { isDuplicateKeyError } from '../../../../common/errors/mongo-errors';
import { USER_TYPES, UserProfile, UserType } from '../../domain/models/user-profile.model';
import type {
  IUserProfilesRepository,
  ProfileActivity,
} from '../../domain/ports/user-profiles.port';
import { UserProfileSchema } from '../schemas/user-profile.schema';

/**
 * Adapter: perfiles de usuario en MongoDB
 */
@Injectable()
export class MongoDbUserProfilesRepository implements IUserProfilesRepository {
  private readonly logger = new Logger(MongoDbUserProfilesRepository.name);

  constructor(
    @InjectModel(UserProfileSchema.name)
    private readonly profileModel: Model<UserProfileSchema>,
  ) {}

  async findById(id: string): Promise<UserProfile | null> {
    try {
      const document = await this.profileModel.findOne({ id }).exec();
      return document ? this.mapToDomain(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando perfil ${id}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async ensureProfile(id: string, userType: UserType): Promise<void> {
    try {
      await this.profileModel
        .updateOne(
          { id },
          { $setOnInsert: { userType, isDevicePaired: false } },
          { upsert: true },
        )
        .exec();
    } catch (error) {
      // Dos upserts simultáneos: el perdedor choca con el índice único de id
      if (isDuplicateKeyError(error)) {
        return;
      }
      this.logger.error(`Error creando perfil ${id}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async recordActivity(activity: ProfileActivity): Promise<boolean> {
    try {
      const result = await this.profileModel
        .updateOne(
          {
            id: activity.userId,
            $or: [
              { lastActiveAt: null },
              { lastActiveAt: { $lte: activity.at } },
            ],
          },
          {
            $set: {
              lastActiveAt: activity.at,
              lastActivityType: activity.activityType,
              ...(activity.deviceInfo && { deviceInfo: activity.deviceInfo }),
            },
            $setOnInsert: { userType: 'child', isDevicePaired: false },
          },
          { upsert: true },
        )
        .exec();
      return result.modifiedCount > 0 || result.upsertedCount > 0;
    } catch (error) {
      // El filtro no casó porque existe una actividad más reciente
      if (isDuplicateKeyError(error)) {
        return false;
      }
      this.logger.error(
        `Error registrando actividad de ${activity.userId}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }

  async findInactiveChildren(before: Date): Promise<UserProfile[]> {
    try {
      const documents = await this.profileModel
        .find({ userType: 'child', lastActiveAt: { $lt: before } })
        .exec();
      return documents.flatMap((document) => {
        const profile = this.mapToDomain(document);
        return profile ? [profile] : [];
      });
    } catch (error) {
      this.logger.error(`Error buscando hijos inactivos: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Mapea documento de MongoDB a modelo de dominio; descarta documentos corruptos
   */
  private mapToDomain(document: UserProfileSchema): UserProfile | null {
    if (!document.id || !USER_TYPES.includes(document.userType)) {
      this.logger.warn(`Perfil con formato inválido ignorado: ${document.id}`);
      return null;
    }

    return {
      id: document.id,
      userType: document.userType,
      isDevicePaired: document.isDevicePaired === true,
      pairedWithParent: document.pairedWithParent,
      pairedAt: document.pairedAt,
      unlinkedAt: document.unlinkedAt,
      lastActiveAt: document.lastActiveAt,
      lastActivityType: document.lastActivityType,
      deviceInfo: document.deviceInfo,
    };
  }
}
