import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { errorMessage } from '../../../../common/errors/domain.error';
import type { Notification } from '../../domain/models/notification.model';
import { isNotificationType } from '../../domain/models/notification.model';
import type { INotificationsRepository } from '../../domain/ports/notifications.port';
import { NotificationSchema } from '../schemas/notification.schema';

@Injectable()
export class MongoDbNotificationsRepository implements INotificationsRepository {
  private readonly logger = new Logger(MongoDbNotificationsRepository.name);

  constructor(
    @InjectModel(NotificationSchema.name)
    private readonly notificationModel: Model<NotificationSchema>,
  ) {}

  async create(notification: Notification): Promise<Notification> {
    try {
      await this.notificationModel.create({ ...notification });
      return notification;
    } catch (error) {
      this.logger.error(
        `Error guardando aviso ${notification.type} para ${notification.recipientId}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }

  async findByRecipient(recipientId: string, limit: number): Promise<Notification[]> {
    try {
      const documents = await this.notificationModel
        .find({ recipientId })
        .sort({ timestamp: -1 })
        .limit(limit)
        .exec();
      return documents.flatMap((document) => {
        const notification = this.mapToDomain(document);
        return notification ? [notification] : [];
      });
    } catch (error) {
      this.logger.error(`Error listando avisos de ${recipientId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findById(id: string): Promise<Notification | null> {
    try {
      const document = await this.notificationModel.findOne({ id }).exec();
      return document ? this.mapToDomain(document) : null;
    } catch (error) {
      this.logger.error(`Error buscando aviso ${id}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async markRead(id: string, recipientId: string): Promise<Notification | null> {
    try {
      const document = await this.notificationModel
        .findOneAndUpdate({ id, recipientId }, { $set: { isRead: true } }, { new: true })
        .exec();
      return document ? this.mapToDomain(document) : null;
    } catch (error) {
      this.logger.error(`Error marcando aviso ${id} como leído: ${errorMessage(error)}`);
      throw error;
    }
  }

  private mapToDomain(document: NotificationSchema): Notification | null {
    if (!isNotificationType(document.type) || !(document.timestamp instanceof Date)) {
      this.logger.warn(`Aviso con formato inválido ignorado: ${document.id}`);
      return null;
    }

    return {
      id: document.id,
      recipientId: document.recipientId,
      type: document.type,
      title: document.title,
      message: document.message,
      data: document.data ?? {},
      timestamp: document.timestamp,
      isRead: document.isRead === true,
    };
  }
}
