/**
 * Fuente de tiempo inyectable; los servicios nunca llaman a `new Date()` directamente
 */
export interface IClock {
  now(): Date;
}
