import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';
import { PAIRING_CODE_PATTERN } from '../../domain/constants/pairing.constants';

/**
 * Schema: código de emparejamiento.
 * createdAt/expiresAt vienen del reloj del servicio, no de timestamps de Mongoose.
 */
@Schema({ collection: 'pairing_codes', timestamps: false, strict: true })
export class PairingCodeSchema extends AbstractSchema {
  @Prop({ type: String, required: true, match: PAIRING_CODE_PATTERN })
  code!: string;

  @Prop({ type: String, required: true, index: true })
  childUserId!: string;

  @Prop({ type: String, required: true })
  childName!: string;

  @Prop({ type: String, required: true })
  deviceName!: string;

  @Prop({ type: Object })
  deviceInfo?: DeviceInfo;

  @Prop({ type: Date, required: true })
  expiresAt!: Date;

  @Prop({ type: Boolean, required: true, default: false })
  isActive!: boolean;

  @Prop({ type: Boolean, required: true, default: false })
  isExpired!: boolean;

  @Prop({ type: String })
  parentUserId?: string;

  @Prop({ type: Date })
  pairedAt?: Date;

  @Prop({ type: Date })
  cleanedUpAt?: Date;
}

export const PairingCodeSchemaFactory =
  SchemaFactory.createForClass(PairingCodeSchema);

// Búsqueda de código disponible
PairingCodeSchemaFactory.index({ code: 1, isActive: 1, isExpired: 1 });
// Barrido de expirados
PairingCodeSchemaFactory.index({ isActive: 1, isExpired: 1, expiresAt: 1 });
// Purga de registros antiguos
PairingCodeSchemaFactory.index({ createdAt: 1 });

export type PairingCodeDocument = HydratedDocument<PairingCodeSchema>;
