import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import { CLOCK_TIME_PATTERN } from '../../domain/constants/restrictions.constants';

@Schema({ collection: 'bedtime_settings', timestamps: false, strict: true })
export class BedtimeSettingsSchema extends AbstractSchema {
  @Prop({ type: String, required: true, unique: true })
  userId!: string;

  @Prop({ type: Boolean, required: true, default: false, index: true })
  isEnabled!: boolean;

  @Prop({ type: String, required: true, match: CLOCK_TIME_PATTERN })
  startTime!: string;

  @Prop({ type: String, required: true, match: CLOCK_TIME_PATTERN })
  endTime!: string;

  @Prop({ type: [Number], default: [] })
  enabledDays!: number[];

  @Prop({ type: String, required: true })
  timezone!: string;
}

export const BedtimeSettingsSchemaFactory = SchemaFactory.createForClass(BedtimeSettingsSchema);

export type BedtimeSettingsDocument = HydratedDocument<BedtimeSettingsSchema>;
