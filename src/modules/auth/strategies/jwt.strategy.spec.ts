import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { JwtStrategy } from './jwt.strategy';

describe('JwtStrategy', () => {
  let strategy: JwtStrategy;

  beforeEach(() => {
    strategy = new JwtStrategy(
      new ConfigService({ JWT_SECRET: 'test-secret-placeholder' }),
    );
  });

  it('should map a user subject to an actor', () => {
    expect(strategy.validate({ sub: 'user:parent-1', scope: 'pairing restrictions' })).toEqual({
      actorId: 'parent-1',
      actorType: 'user',
      sub: 'user:parent-1',
      scopes: ['pairing', 'restrictions'],
    });
  });

  it('should map a service subject without scopes', () => {
    expect(strategy.validate({ sub: 'svc:reconciler' })).toEqual({
      actorId: 'reconciler',
      actorType: 'service',
      sub: 'svc:reconciler',
      scopes: [],
    });
  });

  it('should reject a token without sub', () => {
    expect(() => strategy.validate({ scope: 'pairing' })).toThrow(UnauthorizedException);
  });

  it('should reject an unknown subject format', () => {
    expect(() => strategy.validate({ sub: 'device:ipad-1' })).toThrow(
      'Subject inválido: Formato de sub inválido. Se esperaba user:{id} o svc:{id}',
    );
  });

  it('should reject a non-object payload', () => {
    expect(() => strategy.validate('user:parent-1')).toThrow('Payload de token inválido');
  });
});
