import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Min, validateSync } from 'class-validator';
import { LogLevel } from '../common/logger';

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  GCP_PROJECT_ID!: string;

  @IsString()
  @IsNotEmpty()
  GEMINI_MODEL_NAME!: string;

  @IsString()
  @IsNotEmpty()
  DATASTORE_ID!: string;

  @IsString()
  @IsNotEmpty()
  GCS_PROMPT_BUCKET_NAME!: string;

  @IsOptional()
  @IsString()
  GCP_LOCATION?: string;

  @IsOptional()
  @IsString()
  PROMPT_PATH_PREFIX?: string;

  @IsOptional()
  @IsString()
  ANSWER_KEY_PATH_PREFIX?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  GEMINI_TIMEOUT_MS?: number;

  @IsOptional()
  @IsString()
  VISION_API_KEY?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  OCR_TIMEOUT_MS?: number;

  @IsOptional()
  @IsString()
  STORAGE_ENDPOINT?: string;

  @IsOptional()
  @IsString()
  STORAGE_REGION?: string;

  @IsOptional()
  @IsString()
  STORAGE_ACCESS_KEY?: string;

  @IsOptional()
  @IsString()
  STORAGE_SECRET_KEY?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsString()
  CORS_ORIGIN?: string;

  @IsOptional()
  @IsIn(Object.values(LogLevel))
  LOG_LEVEL?: string;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;
}

export const validate = (config: Record<string, unknown>) => {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints || {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
};
