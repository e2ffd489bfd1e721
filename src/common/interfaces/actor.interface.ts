/**
 * Actor derivado del JWT tras autenticación.
 * NO incluir token completo ni secretos.
 */
export interface Actor {
  actorId: string; // id del usuario o servicio
  actorType: 'user' | 'service';
  sub: string; // subject original del JWT
  scopes: string[];
}

/**
 * Parsea `sub` del JWT para derivar actorType y actorId.
 * Formato esperado: `user:{id}` o `svc:{id}`
 */
export function parseSubject(
  sub: string,
): Pick<Actor, 'actorType' | 'actorId'> {
  const userMatch = sub.match(/^user:(.+)$/);
  if (userMatch) {
    return { actorType: 'user', actorId: userMatch[1] };
  }

  const svcMatch = sub.match(/^svc:(.+)$/);
  if (svcMatch) {
    return { actorType: 'service', actorId: svcMatch[1] };
  }

  throw new Error('Formato de sub inválido. Se esperaba user:{id} o svc:{id}');
}
