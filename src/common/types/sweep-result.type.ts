/**
 * Resultado de una tarea periódica; el scheduler lo registra y nunca relanza
 */
export interface SweepResult {
  isSuccess: boolean;
  count: number;
  error?: string;
}
