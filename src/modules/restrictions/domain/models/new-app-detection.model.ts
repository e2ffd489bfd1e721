export type DetectionResolution = 'monitored' | 'ignored';

/**
 * App nueva instalada en el dispositivo del hijo, pendiente de decisión del padre.
 * Terminal una vez procesada.
 */
export interface NewAppDetection {
  /** `{parentId}_{bundleId}` */
  id: string;
  parentId: string;
  deviceId: string;
  bundleId: string;
  appName: string;
  detectedAt: Date;
  isProcessed: boolean;
  resolution?: DetectionResolution;
  processedAt?: Date;
}

export function detectionId(parentId: string, bundleId: string): string {
  return `${parentId}_${bundleId}`;
}
