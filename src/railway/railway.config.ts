import { ConfigService } from '@nestjs/config';

export const RAILWAY_API_URL = 'https://backboard.railway.app/graphql/v2';

export const RAILWAY_CLIENT_CONFIG = Symbol('RAILWAY_CLIENT_CONFIG');

export interface RegistryCredentials {
  readonly username: string;
  readonly password: string;
}

export interface RailwayClientConfig {
  readonly apiUrl: string;
  readonly apiToken: string;
  readonly registryCredentials?: RegistryCredentials;
}

/**
 * Construye la configuración inmutable del cliente de Railway.
 * Las credenciales del registry solo se usan si vienen usuario y token.
 */
export function createRailwayClientConfig(options: {
  apiToken: string;
  apiUrl?: string;
  registryUser?: string;
  registryPassword?: string;
}): RailwayClientConfig {
  const { apiToken, apiUrl, registryUser, registryPassword } = options;

  const registryCredentials =
    registryUser && registryPassword
      ? Object.freeze({ username: registryUser, password: registryPassword })
      : undefined;

  return Object.freeze({
    apiUrl: apiUrl || RAILWAY_API_URL,
    apiToken,
    ...(registryCredentials ? { registryCredentials } : {}),
  });
}

export function railwayClientConfigFactory(configService: ConfigService): RailwayClientConfig {
  return createRailwayClientConfig({
    apiToken: configService.getOrThrow<string>('RAILWAY_API_TOKEN'),
    apiUrl: configService.get<string>('RAILWAY_API_URL'),
    registryUser: configService.get<string>('RAILWAY_DOCKER_REGISTRY_USER'),
    registryPassword: configService.get<string>('RAILWAY_DOCKER_REGISTRY_TOKEN'),
  });
}
