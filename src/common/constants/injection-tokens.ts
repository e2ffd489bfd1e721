/**
 * Injection tokens for dependency injection across the application.
 * Used for interface-based dependencies shared by several modules.
 * Los puertos propios de cada módulo viven en su `domain/constants`.
 */
export const INJECTION_TOKENS = {
  // Reloj
  CLOCK: Symbol('CLOCK'),

  // Cache
  CACHE_SERVICE: Symbol('CACHE_SERVICE'),

  // Repositories compartidos entre módulos
  USER_PROFILES_REPOSITORY: Symbol('USER_PROFILES_REPOSITORY'),
  RELATIONSHIPS_REPOSITORY: Symbol('RELATIONSHIPS_REPOSITORY'),
  PAIRING_CODES_REPOSITORY: Symbol('PAIRING_CODES_REPOSITORY'),
};
