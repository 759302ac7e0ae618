import { registerAs } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsString,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { resolve } from 'node:path';
import { InvalidConfigError } from '../common/errors';

export interface SourceDatabaseConfig {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  readonly schema: string;
}

export interface GraphDatabaseConfig {
  readonly uri: string;
  readonly user: string;
  readonly password: string;
  readonly database: string;
}

export interface EtlConfig {
  readonly source: SourceDatabaseConfig;
  readonly graph: GraphDatabaseConfig;
  /** Where extraction writes and the engine reads the flat files. */
  readonly exportDir: string;
  /** Root of the transformed artifacts (`online/` and `bulk/` below it). */
  readonly importDir: string;
  readonly chunkSize: number;
  readonly loadBatchSize: number;
  readonly maxBatchRetries: number;
  readonly retryBaseDelayMs: number;
  readonly maxReportedSkips: number;
}

/**
 * Recognized environment variables. Defaults apply when a variable is unset.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  DATABASE_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  DATABASE_PORT: number = 3306;

  @IsString()
  @IsNotEmpty()
  DATABASE_USER: string = 'root';

  @IsString()
  DATABASE_PASSWORD: string = 'password';

  @IsString()
  @IsNotEmpty()
  DATABASE_NAME: string = 'ohdsi';

  // Interpolated into queries as an identifier
  @Matches(/^[A-Za-z_][A-Za-z0-9_]*$/)
  OMOP_SCHEMA: string = 'cdm';

  @Matches(/^(neo4j|bolt)(\+s|\+ssc)?:\/\/.+/)
  NEO4J_URI: string = 'neo4j://localhost:7687';

  @IsString()
  @IsNotEmpty()
  NEO4J_USER: string = 'neo4j';

  @IsString()
  NEO4J_PASSWORD: string = 'password';

  @IsString()
  @IsNotEmpty()
  NEO4J_DATABASE: string = 'neo4j';

  @IsString()
  @IsNotEmpty()
  EXPORT_DIR: string = './export';

  @IsString()
  @IsNotEmpty()
  IMPORT_DIR: string = './import';

  @IsInt()
  @Min(1)
  TRANSFORMATION_CHUNK_SIZE: number = 100_000;

  @IsInt()
  @Min(1)
  LOAD_CSV_BATCH_SIZE: number = 10_000;

  @IsInt()
  @Min(0)
  @Max(10)
  LOAD_MAX_RETRIES: number = 3;

  @IsInt()
  @Min(0)
  LOAD_RETRY_BASE_DELAY_MS: number = 500;

  @IsInt()
  @Min(0)
  MAX_REPORTED_SKIPS: number = 100;
}

export function validateEnvironment(
  env: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, env, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new InvalidConfigError(
      errors.flatMap((error) =>
        Object.values(error.constraints ?? {}).map(
          (message) => `${error.property}: ${message}`,
        ),
      ),
    );
  }
  return validated;
}

export function buildEtlConfig(env: EnvironmentVariables): EtlConfig {
  return Object.freeze({
    source: Object.freeze({
      host: env.DATABASE_HOST,
      port: env.DATABASE_PORT,
      user: env.DATABASE_USER,
      password: env.DATABASE_PASSWORD,
      database: env.DATABASE_NAME,
      schema: env.OMOP_SCHEMA,
    }),
    graph: Object.freeze({
      uri: env.NEO4J_URI,
      user: env.NEO4J_USER,
      password: env.NEO4J_PASSWORD,
      database: env.NEO4J_DATABASE,
    }),
    exportDir: resolve(env.EXPORT_DIR),
    importDir: resolve(env.IMPORT_DIR),
    chunkSize: env.TRANSFORMATION_CHUNK_SIZE,
    loadBatchSize: env.LOAD_CSV_BATCH_SIZE,
    maxBatchRetries: env.LOAD_MAX_RETRIES,
    retryBaseDelayMs: env.LOAD_RETRY_BASE_DELAY_MS,
    maxReportedSkips: env.MAX_REPORTED_SKIPS,
  });
}

/**
 * The only place the process environment is read. Everything downstream
 * receives the frozen `EtlConfig` through `@Inject(etlConfig.KEY)`.
 */
export const etlConfig = registerAs('etl', () =>
  buildEtlConfig(validateEnvironment(process.env)),
);
