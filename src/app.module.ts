// Nest Modules
import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { MongooseModule } from '@nestjs/mongoose';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';

// Shared Modules
import { SharedContextModule } from './shared/shared-context.module';
import { BootstrapModule } from './common/bootstrap/bootstrap.module';

// Feature Modules
import { AuditModule } from './modules/audit/audit.module';
import { AuthModule } from './modules/auth/auth.module';
import { BooksModule } from './modules/books/books.module';
import { DevicesModule } from './modules/devices/devices.module';
import { EntitlementsModule } from './modules/entitlements/entitlements.module';
import { PurchasesModule } from './modules/purchases/purchases.module';
import { UsersModule } from './modules/users/users.module';

// Controller
import { AppController } from './app.controller';

// Middlewares
import { LoggingMiddleware, RequestIdMiddleware } from './middlewares';

// Interceptors
import { AuthenticationInterceptor } from './common/interceptors/authentication.interceptor';

// Config Schema
import { configValidationSchema } from './config/config.schema';

@Module({
  imports: [
    // ⭐ SharedContextModule: PRIMERO para que ClsService esté disponible globalmente
    SharedContextModule,

    ConfigModule.forRoot({
      validationSchema: configValidationSchema,
      isGlobal: true,
    }),

    // Events
    EventEmitterModule.forRoot(),

    // Rate limit: 100 requests por minuto y cliente
    ThrottlerModule.forRoot({
      throttlers: [
        {
          ttl: 60000,
          limit: 100,
        },
      ],
    }),

    // MongoDB connection
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.getOrThrow<string>('DB_HOST'),
      }),
    }),

    // Modules
    AuditModule,
    AuthModule,
    BooksModule,
    DevicesModule,
    EntitlementsModule,
    PurchasesModule,
    UsersModule,

    // Seed del catálogo
    BootstrapModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    // Global interceptor para autenticación (establecer actor en contexto async)
    {
      provide: APP_INTERCEPTOR,
      useClass: AuthenticationInterceptor,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestIdMiddleware, LoggingMiddleware).forRoutes('*');
  }
}
