import { Global, Module } from '@nestjs/common';
import { ClsModule } from 'nestjs-cls';

import { AsyncContextService } from '../common/context/async-context.service';
import { INJECTION_TOKENS } from '../common/constants/injection-tokens';
import { SystemClock } from '../common/clock/system-clock';
import { InMemoryCacheService } from '../common/cache/in-memory-cache.service';

/**
 * SharedContextModule: contexto async (nestjs-cls), reloj y cache
 * disponibles para todos los módulos.
 *
 * Debe importarse primero en AppModule para que ClsMiddleware envuelva
 * al resto de middlewares.
 */
@Global()
@Module({
  imports: [
    ClsModule.forRoot({
      global: true,
      middleware: {
        mount: true,
        generateId: true,
      },
    }),
  ],
  providers: [
    AsyncContextService,
    {
      provide: INJECTION_TOKENS.CLOCK,
      useClass: SystemClock,
    },
    {
      provide: INJECTION_TOKENS.CACHE_SERVICE,
      useClass: InMemoryCacheService,
    },
  ],
  exports: [
    ClsModule,
    AsyncContextService,
    INJECTION_TOKENS.CLOCK,
    INJECTION_TOKENS.CACHE_SERVICE,
  ],
})
export class SharedContextModule {}
