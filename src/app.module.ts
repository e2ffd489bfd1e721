// Nest Modules
import { MiddlewareConsumer, Module, RequestMethod } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerModule } from '@nestjs/throttler';
import { MongooseModule } from '@nestjs/mongoose';

// Shared Modules
import { SharedContextModule } from './shared/shared-context.module';
import { AuthModule } from './modules/auth/auth.module';
import { HeartbeatsModule } from './modules/heartbeats/heartbeats.module';
import { NotificationsModule } from './modules/notifications/notifications.module';
import { PairingModule } from './modules/pairing/pairing.module';
import { ReconciliationModule } from './modules/reconciliation/reconciliation.module';
import { RestrictionsModule } from './modules/restrictions/restrictions.module';
import { UsersModule } from './modules/users/users.module';

// Controller
import { AppController } from './app.controller';

// Middlewares
import {
  ApiKeyMiddleware,
  LoggingMiddleware,
  RequestIdMiddleware,
} from './middlewares';

// Interceptors
import { ApiResponseStatusInterceptor } from './common/interceptors/api-response-status.interceptor';
import { AuthenticationInterceptor } from './common/interceptors/authentication.interceptor';

// Config Schema
import { configValidationSchema } from './config/config.schema';

@Module({
  imports: [
    // ⭐ SharedContextModule: Importar PRIMERO para que ClsService esté disponible globalmente
    SharedContextModule,

    // Validation Schemas
    ConfigModule.forRoot({
      validationSchema: configValidationSchema,
      isGlobal: true,
    }),

    // Events
    EventEmitterModule.forRoot(),

    // Tareas programadas (barridos de reconciliación, horarios de descanso)
    ScheduleModule.forRoot(),

    // Throttler Module
    ThrottlerModule.forRoot([
      {
        ttl: 60_000,
        limit: 10,
      },
    ]),

    // MongoDB connection
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.get<string>('DB_HOST'),
      }),
    }),

    // Modules
    AuthModule,
    UsersModule,
    PairingModule,
    HeartbeatsModule,
    ReconciliationModule,
    RestrictionsModule,
    NotificationsModule,
  ],
  controllers: [AppController],
  providers: [
    // Global interceptor para autenticación (establecer actor en contexto async)
    {
      provide: APP_INTERCEPTOR,
      useClass: AuthenticationInterceptor,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: ApiResponseStatusInterceptor,
    },
  ],
})
export class AppModule {
  configure(consumer: MiddlewareConsumer) {
    // Aplicar LoggingMiddleware a TODAS las rutas
    consumer.apply(LoggingMiddleware).forRoutes('*');

    // Aplicar RequestIdMiddleware a TODAS las rutas
    consumer.apply(RequestIdMiddleware).forRoutes('*');

    // x-api-key en todo salvo el health check
    consumer
      .apply(ApiKeyMiddleware)
      .exclude({ path: 'health', method: RequestMethod.GET })
      .forRoutes('*');
  }
  static port: number;

  constructor(configService: ConfigService) {
    AppModule.port = Number(configService.get<number | string>('PORT') ?? 9053);
  }
}
