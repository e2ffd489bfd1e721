import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { ClientSession, Connection, Model } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import { isDuplicateKeyError } from '../../../../common/errors/mongo-errors';
import { UserProfileSchema } from '../../../users/infrastructure/schemas/user-profile.schema';
import type { Relationship } from '../../domain/models/relationship.model';
import type {
  IPairingUnitOfWork,
  PairingCommit,
  PairingCommitResult,
  UnpairCommit,
} from '../../domain/ports/pairing-unit-of-work.port';
import { PairingCodeSchema } from '../schemas/pairing-code.schema';
import { RelationshipSchema } from '../schemas/relationship.schema';
import { toRelationship } from './pairing.mappers';

/**
 * Aborta la transacción con un resultado de negocio (no es un fallo del almacén)
 */
class PairingConflict extends Error {
  constructor(readonly result: PairingCommitResult) {
    super(`Conflicto de emparejamiento: ${result.status}`);
  }
}

/**
 * Adapter: transacciones MongoDB para emparejar y desvincular.
 * Requiere un replica set (las transacciones no existen en un mongod aislado).
 */
@Injectable()
export class MongoDbPairingUnitOfWork implements IPairingUnitOfWork {
  private readonly logger = new Logger(MongoDbPairingUnitOfWork.name);

  constructor(
    @InjectConnection() private readonly connection: Connection,
    @InjectModel(PairingCodeSchema.name)
    private readonly codeModel: Model<PairingCodeSchema>,
    @InjectModel(RelationshipSchema.name)
    private readonly relationshipModel: Model<RelationshipSchema>,
    @InjectModel(UserProfileSchema.name)
    private readonly profileModel: Model<UserProfileSchema>,
  ) {}

  async commitPairing(commit: PairingCommit): Promise<PairingCommitResult> {
    const { pairingCode, relationship, pairedAt } = commit;
    const session = await this.connection.startSession();
    try {
      await session.withTransaction(async () => {
        // Compare-and-set: solo una transacción consume el código
        const consumed = await this.codeModel
          .findOneAndUpdate(
            { id: pairingCode.id, isActive: false, isExpired: false },
            {
              $set: {
                isActive: true,
                parentUserId: relationship.parentUserId,
                pairedAt,
                updatedAt: pairedAt,
              },
            },
            { session, new: true },
          )
          .exec();
        if (!consumed) {
          throw new PairingConflict({ status: 'code_consumed' });
        }

        const existing = await this.relationshipModel
          .findOne({
            parentUserId: relationship.parentUserId,
            childUserId: relationship.childUserId,
            isActive: true,
          })
          .session(session)
          .exec();
        if (existing) {
          throw new PairingConflict({ status: 'already_paired' });
        }

        await this.relationshipModel.create([{ ...relationship }], { session });

        await this.profileModel
          .updateOne(
            { id: relationship.childUserId },
            {
              $set: {
                isDevicePaired: true,
                pairedWithParent: relationship.parentUserId,
                pairedAt,
              },
              $setOnInsert: { userType: 'child' },
            },
            { session, upsert: true },
          )
          .exec();
      });

      return { status: 'committed', relationship };
    } catch (error) {
      if (error instanceof PairingConflict) {
        return error.result;
      }
      // Índice parcial único sobre relaciones activas
      if (isDuplicateKeyError(error)) {
        return { status: 'already_paired' };
      }
      this.logger.error(
        `Error en transacción de emparejamiento del código ${pairingCode.code}: ${errorMessage(error)}`,
      );
      throw error;
    } finally {
      await session.endSession();
    }
  }

  async commitUnpair(commit: UnpairCommit): Promise<Relationship | null> {
    const session = await this.connection.startSession();
    try {
      let unlinked: Relationship | null = null;

      await session.withTransaction(async () => {
        unlinked = null;
        const updated = await this.relationshipModel
          .findOneAndUpdate(
            { id: commit.relationshipId, isActive: true },
            {
              $set: {
                isActive: false,
                unlinkedAt: commit.unlinkedAt,
                unlinkedBy: commit.unlinkedBy,
              },
            },
            { session, new: true },
          )
          .exec();
        if (!updated) {
          return;
        }

        await this.clearPairedFlagIfUnlinked(updated.childUserId, commit.unlinkedAt, session);
        unlinked = toRelationship(updated);
      });

      return unlinked;
    } catch (error) {
      this.logger.error(
        `Error desvinculando la relación ${commit.relationshipId}: ${errorMessage(error)}`,
      );
      throw error;
    } finally {
      await session.endSession();
    }
  }

  /**
   * El hijo deja de figurar emparejado solo si no le queda ninguna relación activa
   */
  private async clearPairedFlagIfUnlinked(
    childUserId: string,
    unlinkedAt: Date,
    session: ClientSession,
  ): Promise<void> {
    const remaining = await this.relationshipModel
      .countDocuments({ childUserId, isActive: true })
      .session(session)
      .exec();
    if (remaining > 0) {
      return;
    }

    await this.profileModel
      .updateOne(
        { id: childUserId },
        { $set: { isDevicePaired: false, unlinkedAt }, $unset: { pairedWithParent: '' } },
        { session },
      )
      .exec();
  }
}
