import type { PairingCode } from '../../domain/models/pairing-code.model';
import type { Relationship } from '../../domain/models/relationship.model';
import { PAIRING_CODE_PATTERN } from '../../domain/constants/pairing.constants';
import type { PairingCodeSchema } from '../schemas/pairing-code.schema';
import type { RelationshipSchema } from '../schemas/relationship.schema';

const isDate = (value: unknown): value is Date =>
  value instanceof Date && !Number.isNaN(value.getTime());

const isOptionalDate = (value: unknown): boolean =>
  value === undefined || value === null || isDate(value);

const optionalDate = (value: Date | undefined | null): Date | undefined =>
  value ?? undefined;

/**
 * Mapea documento a dominio; null si el documento no cumple el formato
 */
export function toPairingCode(document: PairingCodeSchema): PairingCode | null {
  if (
    !document.id ||
    !PAIRING_CODE_PATTERN.test(document.code) ||
    !document.childUserId ||
    !isDate(document.createdAt) ||
    !isDate(document.expiresAt) ||
    typeof document.isActive !== 'boolean' ||
    typeof document.isExpired !== 'boolean'
  ) {
    return null;
  }

  return {
    id: document.id,
    code: document.code,
    childUserId: document.childUserId,
    childName: document.childName,
    deviceName: document.deviceName,
    deviceInfo: document.deviceInfo,
    createdAt: document.createdAt,
    expiresAt: document.expiresAt,
    isActive: document.isActive,
    isExpired: document.isExpired,
    parentUserId: document.parentUserId,
    pairedAt: optionalDate(document.pairedAt),
    cleanedUpAt: optionalDate(document.cleanedUpAt),
  };
}

export function toRelationship(document: RelationshipSchema): Relationship | null {
  if (
    !document.id ||
    !document.parentUserId ||
    !document.childUserId ||
    !isDate(document.createdAt) ||
    typeof document.isActive !== 'boolean' ||
    !Number.isInteger(document.missedHeartbeats) ||
    document.missedHeartbeats < 0 ||
    !isOptionalDate(document.lastHeartbeatAt) ||
    !isOptionalDate(document.lastSyncAt)
  ) {
    return null;
  }

  return {
    id: document.id,
    parentUserId: document.parentUserId,
    childUserId: document.childUserId,
    childName: document.childName,
    deviceName: document.deviceName,
    pairingCode: document.pairingCode,
    createdAt: document.createdAt,
    isActive: document.isActive,
    lastSyncAt: optionalDate(document.lastSyncAt),
    lastHeartbeatAt: optionalDate(document.lastHeartbeatAt),
    missedHeartbeats: document.missedHeartbeats,
    isNormalClosure: document.isNormalClosure === true,
    childDeviceInfo: document.childDeviceInfo,
    unlinkedAt: optionalDate(document.unlinkedAt),
    unlinkedBy: document.unlinkedBy,
    lastGracefulShutdownAt: optionalDate(document.lastGracefulShutdownAt),
  };
}
