import knownApps from '../../data/known-apps.json';

const KNOWN_APPS: Readonly<Record<string, string>> = knownApps;

/**
 * Nombre visible de una app; sin entrada en el catálogo, el último segmento del bundle id
 */
export function appNameFor(bundleId: string): string {
  return KNOWN_APPS[bundleId] ?? bundleId.split('.').pop() ?? bundleId;
}
