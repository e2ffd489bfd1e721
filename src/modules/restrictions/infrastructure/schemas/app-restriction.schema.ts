import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';

/**
 * Schema: restricción por app. `updatedAt` lo fija el servicio con su reloj.
 */
@Schema({ collection: 'app_restrictions', timestamps: false, strict: true })
export class AppRestrictionSchema extends AbstractSchema {
  @Prop({ type: String, required: true })
  parentId!: string;

  @Prop({ type: String, required: true })
  bundleId!: string;

  @Prop({ type: Number, required: true, min: 0, default: 0 })
  timeLimit!: number;

  @Prop({ type: Boolean, required: true, default: false })
  isDisabled!: boolean;

  @Prop({ type: Number, required: true, min: 0, default: 0 })
  dailyUsage!: number;

  @Prop({ type: String, required: true })
  lastResetDate!: string;

  @Prop({ type: String, required: true })
  timezone!: string;

  @Prop({ type: Number, required: true, default: 1 })
  version!: number;

  @Prop({ type: Date })
  limitExceededAt?: Date;
}

export const AppRestrictionSchemaFactory = SchemaFactory.createForClass(AppRestrictionSchema);

AppRestrictionSchemaFactory.index({ parentId: 1, bundleId: 1 }, { unique: true });

export type AppRestrictionDocument = HydratedDocument<AppRestrictionSchema>;
