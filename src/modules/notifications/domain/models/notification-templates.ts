/**
 * Textos visibles de cada aviso al padre
 */
export interface NotificationText {
  title: string;
  message: string;
}

export function devicePairedText(childName: string, deviceName: string): NotificationText {
  return {
    title: 'Dispositivo vinculado',
    message: `${deviceName} de ${childName} ya está vinculado a tu cuenta.`,
  };
}

export function deviceUnlinkedText(childName: string): NotificationText {
  return {
    title: 'Dispositivo desvinculado',
    message: `El dispositivo de ${childName} se ha desvinculado de tu cuenta.`,
  };
}

export function supervisionEndedText(): NotificationText {
  return {
    title: 'Supervisión finalizada',
    message: 'Tu dispositivo ya no está vinculado a la cuenta que lo supervisaba.',
  };
}

export function missedHeartbeatText(missedHeartbeats: number, childName: string): NotificationText {
  switch (missedHeartbeats) {
    case 1:
      return {
        title: 'Primer heartbeat perdido',
        message: `El dispositivo de ${childName} no envió su primer heartbeat. Puede que la app se haya cerrado o que no tenga conexión.`,
      };
    case 2:
      return {
        title: 'Segundo heartbeat perdido',
        message: `El dispositivo de ${childName} lleva 2 heartbeats sin responder. Puede que la app se haya borrado o que el dispositivo esté apagado.`,
      };
    case 3:
      return {
        title: 'Tercer heartbeat perdido',
        message: `El dispositivo de ${childName} lleva 3 heartbeats sin responder. Probablemente la app se ha borrado del dispositivo.`,
      };
    case 4:
      return {
        title: 'Cuarto heartbeat perdido',
        message: `El dispositivo de ${childName} lleva 4 heartbeats sin responder. Casi con seguridad la app se ha borrado.`,
      };
    default:
      return {
        title: 'Dispositivo sin conexión prolongada',
        message: `El dispositivo de ${childName} lleva mucho tiempo sin conexión. La app se ha borrado o el dispositivo tiene problemas.`,
      };
  }
}

export function inactivityText(childName: string): NotificationText {
  return {
    title: 'Dispositivo inactivo',
    message: `${childName} no ha abierto la app en 3 días. Revisa su dispositivo.`,
  };
}

export function limitExceededText(appName: string, timeLimitSeconds: number): NotificationText {
  const minutes = Math.round(timeLimitSeconds / 60);
  return {
    title: 'Límite diario alcanzado',
    message: `${appName} ha alcanzado su límite de ${minutes} minutos y queda bloqueada hasta mañana.`,
  };
}

export function newAppText(appName: string): NotificationText {
  return {
    title: 'App nueva detectada',
    message: `Se ha instalado ${appName}. Decide si quieres supervisarla.`,
  };
}
