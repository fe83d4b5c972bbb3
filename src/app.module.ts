import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { BackgroundTasksModule } from './common/background/background-tasks.module';
import { DatabaseConfig, buildDatabaseSsl } from './config/configuration';
import { OrdersModule } from './modules/orders/orders.module';
import { UsageLogModule } from './modules/usage-log/usage-log.module';
import { TelegramModule } from './telegram/telegram.module';
import { HealthModule } from './health/health.module';
import configuration from './config/configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const isProduction = configService.get('nodeEnv') === 'production';
        const database = configService.getOrThrow<DatabaseConfig>('database');
        return {
          type: 'postgres',
          ...database,
          entities: [__dirname + '/**/*.entity{.ts,.js}'],
          migrations: [__dirname + '/migrations/*{.ts,.js}'],
          migrationsRun: true,
          synchronize: false,
          logging: !isProduction,
          // Hosted PostgreSQL requires SSL
          ssl: buildDatabaseSsl(isProduction, configService.get<string>('databaseCaCert')),
        };
      },
      inject: [ConfigService],
    }),
    BackgroundTasksModule,
    OrdersModule,
    UsageLogModule,
    TelegramModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
  ],
})
export class AppModule { }
