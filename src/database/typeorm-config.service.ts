import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', {
      infer: true,
    });

    // Entities are registered through TypeOrmModule.forFeature in each module
    if (database.type === 'better-sqlite3') {
      return {
        type: 'better-sqlite3',
        database: database.name,
        synchronize: database.synchronize,
        dropSchema: false,
        logging: database.logging,
        autoLoadEntities: true,
      };
    }

    return {
      type: 'postgres',
      url: database.url,
      host: database.host,
      port: database.port,
      username: database.username,
      password: database.password,
      database: database.name,
      synchronize: database.synchronize,
      dropSchema: false,
      logging: database.logging,
      autoLoadEntities: true,
      extra: {
        // based on https://node-postgres.com/apis/pool
        // max connection pool size
        max: database.maxConnections,
        ssl: database.sslEnabled
          ? { rejectUnauthorized: database.rejectUnauthorized }
          : undefined,
      },
    };
  }
}
