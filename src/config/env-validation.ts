import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

enum NodeEnv {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariables {
  @IsEnum(NodeEnv)
  @IsOptional()
  NODE_ENV: NodeEnv = NodeEnv.Development;

  @IsNumber()
  @IsOptional()
  PORT: number = 3000;

  @IsInt()
  @Min(1)
  @IsOptional()
  EXCHANGE_CACHE_TTL_SECONDS?: number;

  @IsUrl({ require_tld: false })
  @IsOptional()
  EXCHANGE_PROVIDER_BASE_URL?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  EXCHANGE_PROVIDER_TIMEOUT_MS?: number;

  @IsInt()
  @Min(0)
  @Max(8)
  @IsOptional()
  EXCHANGE_AMOUNT_PRECISION?: number;

  @IsString()
  @IsOptional()
  METRICS_DEFAULT_COLLECT?: string;

  @IsString()
  @IsOptional()
  METRICS_PREFIX?: string;

  @IsString()
  @IsOptional()
  CORS_ORIGINS?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  return validatedConfig;
}
