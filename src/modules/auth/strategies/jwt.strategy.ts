import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';

import { ExtractJwt, Strategy } from 'passport-jwt';

import { Actor, parseSubject } from '../../../common/interfaces/actor.interface';
import { errorMessage } from '../../../common/errors/domain.error';

/**
 * Estrategia JWT (HS256, secreto compartido con el proveedor de identidad).
 * - Token en Authorization: Bearer
 * - `sub` con formato user:{id} o svc:{id}
 * - Fail-closed: rechaza cualquier token inválido
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
      algorithms: ['HS256'],
    });
  }

  validate(payload: unknown): Actor {
    if (typeof payload !== 'object' || payload === null) {
      throw new UnauthorizedException('Payload de token inválido');
    }

    const sub =
      'sub' in payload && typeof payload.sub === 'string' ? payload.sub : undefined;
    if (!sub) {
      throw new UnauthorizedException('Falta el claim sub');
    }

    try {
      const { actorType, actorId } = parseSubject(sub);
      const scope =
        'scope' in payload && typeof payload.scope === 'string'
          ? payload.scope
          : '';

      return {
        actorId,
        actorType,
        sub,
        scopes: scope ? scope.split(' ') : [],
      };
    } catch (error) {
      throw new UnauthorizedException(`Subject inválido: ${errorMessage(error)}`);
    }
  }
}
