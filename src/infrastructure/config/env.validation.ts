import { plainToInstance } from 'class-transformer';
import {
  Contains,
  IsBooleanString,
  IsIn,
  IsJSON,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  validateSync,
} from 'class-validator';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export class EnvironmentVariables {
  @IsOptional()
  @IsBooleanString()
  JOBLOCATOR_K8S_OPERATOR_ENABLED?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  JOBLOCATOR_K8S_OPERATOR_NAMESPACE?: string;

  @IsOptional()
  @IsString()
  JOBLOCATOR_K8S_OPERATOR_LABEL_SELECTOR?: string;

  @IsOptional()
  @Matches(/^-?\d+$/, { message: 'JOBS_CACHE_TTL must be an integer number of seconds' })
  JOBS_CACHE_TTL?: string;

  @IsOptional()
  @IsString()
  KUBERNETES_SERVICE_ACCOUNT_TOKEN_PATH?: string;

  @IsOptional()
  @IsJSON()
  PROXY_TARGET_MAP?: string;

  @IsOptional()
  @Contains('{app}')
  PROXY_DEFAULT_TARGET_TEMPLATE?: string;

  @IsOptional()
  @Matches(/^\d+$/, { message: 'PROXY_TIMEOUT_MS must be a non-negative integer' })
  PROXY_TIMEOUT_MS?: string;

  @IsOptional()
  @IsBooleanString()
  DEBUG?: string;

  @IsOptional()
  @IsString()
  APP_VERSION?: string;

  @IsOptional()
  @IsJSON()
  UI_PATTERNS?: string;

  @IsOptional()
  @IsJSON()
  UI_ENDPOINT_PATH_PATTERNS?: string;

  @IsOptional()
  @IsString()
  ALLOWED_ORIGINS?: string;

  @IsOptional()
  @Matches(/^\d+$/, { message: 'PORT must be a non-negative integer' })
  PORT?: string;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;

  @IsOptional()
  @IsBooleanString()
  LOG_ENABLE_CONSOLE?: string;

  @IsOptional()
  @IsBooleanString()
  LOG_ENABLE_FILES?: string;
}

/**
 * Used as `ConfigModule.forRoot({ validate })`; fails startup on a malformed environment.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}
