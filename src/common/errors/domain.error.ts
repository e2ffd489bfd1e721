import { HttpStatus } from '@nestjs/common';

import { ApiResponse } from '../types/api-response.type';
import type { ResponseMeta } from '../types/api-response.type';

/**
 * Taxonomía de errores de dominio compartida por todos los módulos
 */
export type DomainErrorCode =
  | 'UNAUTHENTICATED'
  | 'INVALID_FORMAT'
  | 'NOT_FOUND'
  | 'CODE_NOT_FOUND'
  | 'CODE_EXPIRED'
  | 'ALREADY_PAIRED'
  | 'ALREADY_EXISTS'
  | 'PERMISSION_DENIED'
  | 'TRANSIENT_STORE_FAILURE';

export const DOMAIN_ERROR_HTTP_STATUS: Record<DomainErrorCode, HttpStatus> = {
  UNAUTHENTICATED: HttpStatus.UNAUTHORIZED,
  INVALID_FORMAT: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  CODE_NOT_FOUND: HttpStatus.NOT_FOUND,
  CODE_EXPIRED: HttpStatus.GONE,
  ALREADY_PAIRED: HttpStatus.CONFLICT,
  ALREADY_EXISTS: HttpStatus.CONFLICT,
  PERMISSION_DENIED: HttpStatus.FORBIDDEN,
  TRANSIENT_STORE_FAILURE: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Mensajes legibles para el usuario final, uno por código
 */
export const DOMAIN_ERROR_MESSAGES: Record<DomainErrorCode, string> = {
  UNAUTHENTICATED: 'Debes iniciar sesión para realizar esta operación.',
  INVALID_FORMAT: 'Introduce un código de emparejamiento válido de 6 dígitos.',
  NOT_FOUND: 'El recurso solicitado no existe.',
  CODE_NOT_FOUND:
    'Código de emparejamiento inválido. Revisa el código e inténtalo de nuevo.',
  CODE_EXPIRED:
    'Este código de emparejamiento ha expirado. Genera un código nuevo.',
  ALREADY_PAIRED: 'Este dispositivo ya está emparejado con tu cuenta.',
  ALREADY_EXISTS: 'El recurso ya existe.',
  PERMISSION_DENIED: 'No tienes permiso para modificar este recurso.',
  TRANSIENT_STORE_FAILURE:
    'Error de conexión. Comprueba tu red e inténtalo de nuevo.',
};

export class DomainError extends Error {
  constructor(
    readonly code: DomainErrorCode,
    message?: string,
  ) {
    super(message ?? DOMAIN_ERROR_MESSAGES[code]);
    this.name = 'DomainError';
  }

  get statusCode(): HttpStatus {
    return DOMAIN_ERROR_HTTP_STATUS[this.code];
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normaliza cualquier error lanzado por la capa de persistencia.
 * Lo que no sea un DomainError se considera fallo transitorio del almacén;
 * el detalle original queda solo en los logs del servicio que lo captura.
 */
export function toDomainError(error: unknown): DomainError {
  if (error instanceof DomainError) {
    return error;
  }

  return new DomainError('TRANSIENT_STORE_FAILURE');
}

/**
 * Construye la respuesta fallida estándar a partir de un error
 */
export function failFromError<T>(
  error: unknown,
  meta?: ResponseMeta,
): ApiResponse<T> {
  const domainError = toDomainError(error);
  return ApiResponse.fail<T>(
    domainError.statusCode,
    domainError.code,
    domainError.message,
    meta,
  );
}
