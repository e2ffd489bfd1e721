import { Prop } from '@nestjs/mongoose';

import { v4 as uuidv4 } from 'uuid';

/**
 * Campos comunes a todas las colecciones.
 * `schemaVersion` permite migrar documentos antiguos de forma explícita
 * en lugar de decodificarlos de manera permisiva.
 */
export class AbstractSchema {
  @Prop({ type: String, required: true, unique: true, default: () => uuidv4() })
  id!: string;

  @Prop({ type: Number, required: true, default: 1 })
  schemaVersion!: number;

  @Prop({ type: Date, default: Date.now })
  createdAt?: Date;

  @Prop({ type: Date, default: Date.now })
  updatedAt?: Date;
}
