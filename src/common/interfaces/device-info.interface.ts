/**
 * Información opaca del dispositivo hijo (modelo, versión de sistema, batería...).
 * El backend la almacena y la devuelve sin interpretarla.
 */
export type DeviceInfo = Record<string, unknown>;
