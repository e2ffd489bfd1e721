import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import type { DetectionResolution } from '../../domain/models/new-app-detection.model';

/**
 * Schema: app detectada. `id` es `{parentId}_{bundleId}`.
 */
@Schema({ collection: 'new_app_detections', timestamps: true, strict: true })
export class NewAppDetectionSchema extends AbstractSchema {
  @Prop({ type: String, required: true })
  parentId!: string;

  @Prop({ type: String, required: true })
  deviceId!: string;

  @Prop({ type: String, required: true })
  bundleId!: string;

  @Prop({ type: String, required: true })
  appName!: string;

  @Prop({ type: Date, required: true })
  detectedAt!: Date;

  @Prop({ type: Boolean, required: true, default: false })
  isProcessed!: boolean;

  @Prop({ type: String, enum: ['monitored', 'ignored'] })
  resolution?: DetectionResolution;

  @Prop({ type: Date })
  processedAt?: Date;
}

export const NewAppDetectionSchemaFactory = SchemaFactory.createForClass(NewAppDetectionSchema);

// Pendientes del padre, más recientes primero
NewAppDetectionSchemaFactory.index({ parentId: 1, isProcessed: 1, detectedAt: -1 });

export type NewAppDetectionDocument = HydratedDocument<NewAppDetectionSchema>;
