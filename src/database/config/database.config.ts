import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { DatabaseConfig } from './database-config.type';

class EnvironmentVariablesValidator {
  @IsIn(['postgres', 'better-sqlite3'])
  DATABASE_TYPE!: string;

  @ValidateIf((envValues) => envValues.DATABASE_URL)
  @IsString()
  DATABASE_URL?: string;

  @ValidateIf(
    (envValues) =>
      !envValues.DATABASE_URL && envValues.DATABASE_TYPE === 'postgres',
  )
  @IsString()
  DATABASE_HOST?: string;

  @ValidateIf(
    (envValues) =>
      !envValues.DATABASE_URL && envValues.DATABASE_TYPE === 'postgres',
  )
  @IsInt()
  @Min(0)
  @Max(65535)
  DATABASE_PORT?: number;

  @ValidateIf(
    (envValues) =>
      !envValues.DATABASE_URL && envValues.DATABASE_TYPE === 'postgres',
  )
  @IsString()
  DATABASE_PASSWORD?: string;

  @ValidateIf((envValues) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_NAME?: string;

  @ValidateIf(
    (envValues) =>
      !envValues.DATABASE_URL && envValues.DATABASE_TYPE === 'postgres',
  )
  @IsString()
  DATABASE_USERNAME?: string;

  @IsBoolean()
  @IsOptional()
  DATABASE_SYNCHRONIZE?: boolean;

  @IsInt()
  @IsOptional()
  DATABASE_MAX_CONNECTIONS?: number;

  @IsBoolean()
  @IsOptional()
  DATABASE_SSL_ENABLED?: boolean;

  @IsBoolean()
  @IsOptional()
  DATABASE_REJECT_UNAUTHORIZED?: boolean;

  @IsString()
  @IsOptional()
  DATABASE_LOGGING?: string;
}

function parseLogging(value: string | undefined): DatabaseConfig['logging'] {
  if (!value || value === 'false') {
    return false;
  }
  if (value === 'true') {
    return true;
  }
  const levels = ['query', 'error', 'schema', 'warn', 'info', 'log'] as const;
  return value
    .split(',')
    .map((level) => level.trim())
    .flatMap((level) => levels.filter((known) => known === level));
}

export default registerAs<DatabaseConfig>('database', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    type:
      process.env.DATABASE_TYPE === 'better-sqlite3'
        ? 'better-sqlite3'
        : 'postgres',
    url: process.env.DATABASE_URL,
    host: process.env.DATABASE_HOST,
    port: process.env.DATABASE_PORT
      ? parseInt(process.env.DATABASE_PORT, 10)
      : 5432,
    password: process.env.DATABASE_PASSWORD,
    name: process.env.DATABASE_NAME || 'travel_approvals',
    username: process.env.DATABASE_USERNAME,
    synchronize: process.env.DATABASE_SYNCHRONIZE === 'true',
    maxConnections: process.env.DATABASE_MAX_CONNECTIONS
      ? parseInt(process.env.DATABASE_MAX_CONNECTIONS, 10)
      : 100,
    sslEnabled: process.env.DATABASE_SSL_ENABLED === 'true',
    rejectUnauthorized: process.env.DATABASE_REJECT_UNAUTHORIZED === 'true',
    logging: parseLogging(process.env.DATABASE_LOGGING),
  };
});
