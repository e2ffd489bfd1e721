import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import type { PairingCode } from '../../domain/models/pairing-code.model';
import type { IPairingCodesRepository } from '../../domain/ports/pairing-codes.port';
import { PairingCodeSchema } from '../schemas/pairing-code.schema';
import { toPairingCode } from './pairing.mappers';

/**
 * Adapter: códigos de emparejamiento en MongoDB
 */
@Injectable()
export class MongoDbPairingCodesRepository implements IPairingCodesRepository {
  private readonly logger = new Logger(MongoDbPairingCodesRepository.name);

  constructor(
    @InjectModel(PairingCodeSchema.name)
    private readonly codeModel: Model<PairingCodeSchema>,
  ) {}

  async create(pairingCode: PairingCode): Promise<PairingCode> {
    try {
      const created = await this.codeModel.create({ ...pairingCode });
      return this.mapOrThrow(created);
    } catch (error) {
      this.logger.error(`Error creando código de emparejamiento: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findAvailable(code: string): Promise<PairingCode | null> {
    try {
      const document = await this.codeModel
        .findOne({ code, isActive: false, isExpired: false })
        .sort({ createdAt: -1 })
        .exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando código disponible: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findLatestConsumed(code: string): Promise<PairingCode | null> {
    try {
      const document = await this.codeModel
        .findOne({ code, isActive: true })
        .sort({ pairedAt: -1 })
        .exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando código consumido: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findLatestUnconsumed(code: string): Promise<PairingCode | null> {
    try {
      const document = await this.codeModel
        .findOne({ code, isActive: false })
        .sort({ createdAt: -1 })
        .exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando código sin consumir: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findLatestForChild(code: string, childUserId: string): Promise<PairingCode | null> {
    try {
      const document = await this.codeModel
        .findOne({ code, childUserId })
        .sort({ createdAt: -1 })
        .exec();
      return document ? this.mapOrSkip(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando código del hijo: ${errorMessage(error)}`);
      throw error;
    }
  }

  async markExpired(id: string, at: Date): Promise<boolean> {
    try {
      const result = await this.codeModel
        .updateOne(
          { id, isActive: false, isExpired: false },
          { $set: { isExpired: true, updatedAt: at } },
        )
        .exec();
      return result.modifiedCount > 0;
    } catch (error) {
      this.logger.error(`Error expirando código ${id}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async expireOverdue(now: Date): Promise<number> {
    try {
      const result = await this.codeModel
        .updateMany(
          { isActive: false, isExpired: false, expiresAt: { $lt: now } },
          { $set: { isExpired: true, cleanedUpAt: now, updatedAt: now } },
        )
        .exec();
      return result.modifiedCount;
    } catch (error) {
      this.logger.error(`Error en barrido de códigos: ${errorMessage(error)}`);
      throw error;
    }
  }

  async deleteCreatedBefore(cutoff: Date): Promise<number> {
    try {
      const result = await this.codeModel.deleteMany({ createdAt: { $lt: cutoff } }).exec();
      return result.deletedCount;
    } catch (error) {
      this.logger.error(`Error purgando códigos antiguos: ${errorMessage(error)}`);
      throw error;
    }
  }

  private mapOrSkip(document: PairingCodeSchema): PairingCode | null {
    const pairingCode = toPairingCode(document);
    if (!pairingCode) {
      this.logger.warn(`Código con formato inválido ignorado: ${document.id}`);
    }
    return pairingCode;
  }

  private mapOrThrow(document: PairingCodeSchema): PairingCode {
    const pairingCode = toPairingCode(document);
    if (!pairingCode) {
      throw new Error(`Documento de código inválido tras escritura: ${document.id}`);
    }
    return pairingCode;
  }
}
