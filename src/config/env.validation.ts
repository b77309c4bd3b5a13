import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const DEFAULT_PORT = 8080;

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty({ message: 'RAILWAY_API_TOKEN environment variable is required' })
  RAILWAY_API_TOKEN!: string;

  @IsString()
  @IsOptional()
  RAILWAY_DOCKER_REGISTRY_USER?: string;

  @IsString()
  @IsOptional()
  RAILWAY_DOCKER_REGISTRY_TOKEN?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  RAILWAY_API_URL?: string;

  @IsString()
  @IsOptional()
  UPDATE_API_TOKEN?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  PORT?: number;
}

/**
 * Valida las variables de entorno al arrancar.
 * Si falta el token de Railway la aplicación no levanta.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  // Las variables vacías del .env cuentan como no definidas
  const defined = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );

  const validatedConfig = plainToInstance(EnvironmentVariables, defined, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Configuración inválida: ${messages.join('; ')}`);
  }
  return validatedConfig;
}
