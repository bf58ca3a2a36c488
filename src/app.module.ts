import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD, APP_FILTER } from '@nestjs/core';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { TransliteratorsModule } from './transliterators/transliterators.module';
import { Transliterator } from './transliterators/entities/transliterator.entity';
import { DataSource, DataSourceOptions } from 'typeorm';

const entities = [Transliterator];
const migrations = ['dist/src/database/migrations/*.js'];

// POSTGRES_URL wins over the individual connection parameters
function getDatabaseConfig(): DataSourceOptions {
  const logging = process.env.NODE_ENV === 'development';

  if (process.env.POSTGRES_URL) {
    return {
      type: 'postgres',
      url: process.env.POSTGRES_URL,
      entities,
      migrations,
      synchronize: false, // NEVER use true in production or when using migrations
      logging,
      ssl: process.env.NODE_ENV === 'production'
        ? { rejectUnauthorized: false }
        : undefined,
      extra: {
        max: 10,
        connectionTimeoutMillis: 5000,
        idleTimeoutMillis: 30000,
      },
    };
  }

  return {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'user',
    password: process.env.DB_PASSWORD || 'password',
    database: process.env.DB_DATABASE || 'transliteration',
    entities,
    migrations,
    synchronize: false,
    logging,
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
    }),
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 1 minute
        limit: 100,
      },
    ]),
    TypeOrmModule.forRootAsync({
      useFactory: () => getDatabaseConfig(),
      dataSourceFactory: async (options) => {
        if (!options) {
          throw new Error('Database configuration options are required');
        }
        return new DataSource(options).initialize();
      },
    }),
    TransliteratorsModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
  ],
})
export class AppModule {}
