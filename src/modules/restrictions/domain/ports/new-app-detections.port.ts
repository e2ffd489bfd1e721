import type {
  DetectionResolution,
  NewAppDetection,
} from '../models/new-app-detection.model';

export interface INewAppDetectionsRepository {
  findById(id: string): Promise<NewAppDetection | null>;

  findPendingByParent(parentId: string): Promise<NewAppDetection[]>;

  /**
   * Bundle ids ya detectados para el padre, procesados o no
   */
  findDetectedBundleIds(parentId: string): Promise<string[]>;

  /**
   * false si ya existía una detección con ese id
   */
  createIfAbsent(detection: NewAppDetection): Promise<boolean>;

  /**
   * Procesa solo si sigue pendiente; null si ya estaba procesada o no existe
   */
  markProcessed(
    id: string,
    resolution: DetectionResolution,
    processedAt: Date,
  ): Promise<NewAppDetection | null>;
}
