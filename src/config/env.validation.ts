import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsNumber, IsOptional, IsString, Matches, Max, Min, validateSync } from 'class-validator';
import { METADATA_PROFILES, WAREHOUSE_SIZES } from './configuration';

const BOOLEAN_STRINGS = ['true', 'false', 'TRUE', 'FALSE'];

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  SOURCE_DB_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  SOURCE_DB_PORT?: number;

  @IsOptional()
  @IsString()
  SOURCE_DB_USERNAME?: string;

  @IsOptional()
  @IsString()
  SOURCE_DB_PASSWORD?: string;

  @IsOptional()
  @IsString()
  SOURCE_DB_NAME?: string;

  @IsOptional()
  @Matches(/^[A-Za-z_][A-Za-z0-9_$]*$/, { message: 'SOURCE_DB_SCHEMA must be a plain SQL identifier' })
  SOURCE_DB_SCHEMA?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  SOURCE_DB_SSL?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  SOURCE_DB_SSL_REJECT_UNAUTHORIZED?: string;

  @IsOptional()
  @Matches(/^[A-Za-z_][A-Za-z0-9_$]*$/, { message: 'SOURCE_PUBLICATION must be a plain SQL identifier' })
  SOURCE_PUBLICATION?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  SHOULD_CONNECT_DB?: string;

  @IsOptional()
  @IsIn([...WAREHOUSE_SIZES, ...WAREHOUSE_SIZES.map((size) => size.toLowerCase())])
  WAREHOUSE_SIZE?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  WAREHOUSE_AUTO_SUSPEND?: number;

  @IsOptional()
  @Matches(/^[A-Za-z0-9.-]+:\d{1,5}$/, { message: 'WAREHOUSE_SOURCE_ENDPOINT must look like host:port' })
  WAREHOUSE_SOURCE_ENDPOINT?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  WAREHOUSE_INTELLIGENCE?: string;

  @IsOptional()
  @IsIn([...METADATA_PROFILES])
  CDC_METADATA_PROFILE?: string;

  @IsOptional()
  @IsInt()
  SEED_RANDOM_SEED?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  SIMULATION_PACE?: number;

  @IsOptional()
  @Matches(/^[a-z0-9-]+$/, { message: 'SIMULATION_SCENARIO must be a kebab-case scenario name' })
  SIMULATION_SCENARIO?: string;
}

export function validate(config: Record<string, unknown>): Record<string, unknown> {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.map((err) => Object.values(err.constraints || {})).flat();
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }
  return config;
}
