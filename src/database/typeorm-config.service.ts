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
      keepConnectionAlive: true,
      autoLoadEntities: true,
      logging: database.logging ? ['error', 'warn', 'query'] : ['error', 'warn'],
      migrations: [__dirname + '/migrations/**/*{.ts,.js}'],
      extra: {
        // based on https://node-postgres.com/api/pool
        max: database.maxConnections,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
        ssl: database.sslEnabled
          ? { rejectUnauthorized: database.rejectUnauthorized }
          : undefined,
      },
    };
  }
}
