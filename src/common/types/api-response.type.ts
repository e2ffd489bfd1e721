import { HttpStatus } from '@nestjs/common';

/**
 * Metadatos de trazabilidad y paginación que acompañan a cada respuesta
 */
export interface ResponseMeta {
  requestId?: string;
  total?: number;
  unread?: number;
  /** false cuando la operación no pudo persistirse */
  success?: boolean;
}

/**
 * Envelope común de todas las respuestas HTTP.
 * `errors` lleva el código de error de dominio (p. ej. CODE_EXPIRED).
 */
export class ApiResponse<T = void> {
  private constructor(
    readonly ok: boolean,
    readonly statusCode: HttpStatus,
    readonly data?: T,
    readonly errors?: string | string[],
    readonly message?: string,
    readonly meta?: ResponseMeta,
  ) {}

  static ok<T = void>(
    statusCode: HttpStatus,
    data?: T,
    message?: string,
    meta?: ResponseMeta,
  ): ApiResponse<T> {
    return new ApiResponse<T>(true, statusCode, data, undefined, message, meta);
  }

  static fail<T = void>(
    statusCode: HttpStatus,
    errors: string | string[],
    message?: string,
    meta?: ResponseMeta,
  ): ApiResponse<T> {
    return new ApiResponse<T>(false, statusCode, undefined, errors, message, meta);
  }
}
