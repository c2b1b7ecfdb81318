import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import mailConfig from './mail/config/mail.config';
import { AllConfigType } from './config/config.type';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { AuthModule } from './auth/auth.module';
import { EmployeesModule } from './employees/employees.module';
import { TravelRequestsModule } from './travel-requests/travel-requests.module';
import { HttpsEnforcementMiddleware } from './utils/https-enforcement.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, authConfig, databaseConfig, mailConfig, throttlerConfig],
      envFilePath: ['.env'],
    }),
    TypeOrmModule.forRootAsync({
      useClass: TypeOrmConfigService,
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    AuthModule,
    EmployeesModule,
    TravelRequestsModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(HttpsEnforcementMiddleware).forRoutes('*');
  }
}
