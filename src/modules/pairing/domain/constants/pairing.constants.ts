/**
 * Injection tokens propios del módulo de emparejamiento.
 * Los repositorios compartidos están en INJECTION_TOKENS.
 */
export const PAIRING_INJECTION_TOKENS = {
  PAIRING_UNIT_OF_WORK: 'IPairingUnitOfWork',
} as const;

export const PAIRING_CODE_LENGTH = 6;
export const PAIRING_CODE_PATTERN = /^\d{6}$/;

// Vigencia del código: 10 minutos
export const PAIRING_CODE_TTL_MS = 10 * 60 * 1000;

// Intentos para evitar colisión con otro código disponible
export const PAIRING_CODE_GENERATION_ATTEMPTS = 5;

// Reintentos cuando otra request consume el código entre lectura y commit
export const PAIRING_COMMIT_ATTEMPTS = 3;

// Un hijo se considera en línea si sincronizó en los últimos 5 minutos
export const CHILD_ONLINE_WINDOW_MS = 5 * 60 * 1000;

export const PAIRING_EVENTS = {
  RELATIONSHIP_CREATED: 'relationship.created',
  RELATIONSHIP_UNLINKED: 'relationship.unlinked',
} as const;
