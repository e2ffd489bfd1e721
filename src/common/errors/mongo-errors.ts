import { mongo } from 'mongoose';

/**
 * E11000: violación de índice único (upsert perdido o relación activa duplicada)
 */
export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongo.MongoServerError && error.code === 11000;
}
