import { Inject, Injectable, Logger } from '@nestjs/common';
import { resolveReplicas } from './deployment-meta';
import { errorMessage, RailwayApiError } from './railway-api.error';
import { RAILWAY_CLIENT_CONFIG, RailwayClientConfig } from './railway.config';
import {
  ENVIRONMENT_SERVICES_QUERY,
  SERVICE_INSTANCE_DEPLOY_MUTATION,
  SERVICE_INSTANCE_UPDATE_MUTATION,
} from './railway.queries';
import {
  EnvironmentServices,
  isJsonObject,
  JsonObject,
  ServiceDescriptor,
  ServiceInstanceNode,
  ServiceInstancesPage,
} from './railway.types';

@Injectable()
export class RailwayClient {
  private readonly logger = new Logger(RailwayClient.name);

  constructor(@Inject(RAILWAY_CLIENT_CONFIG) private readonly config: RailwayClientConfig) {}

  /**
   * Lista los servicios del entorno que tienen una imagen como source.
   * Los plugins (bases de datos) y los servicios construidos desde repo quedan fuera.
   */
  async listServices(environmentId: string): Promise<EnvironmentServices> {
    const services: ServiceDescriptor[] = [];
    let projectId: string | undefined;
    let after: string | null = null;

    do {
      const data = await this.execute('EnvironmentServices', ENVIRONMENT_SERVICES_QUERY, {
        environmentId,
        after,
      });
      const page = parseServiceInstancesPage(data);
      projectId ??= page.projectId;

      for (const node of page.nodes) {
        if (!node.image) {
          continue;
        }
        services.push({
          id: node.serviceId,
          name: node.serviceName,
          image: node.image,
          numReplicas: this.replicasFor(node),
        });
      }

      after = page.hasNextPage && page.endCursor && page.endCursor !== after ? page.endCursor : null;
    } while (after);

    return { environmentId, projectId, services };
  }

  /**
   * Cambia la imagen (y réplicas) de la instancia y luego dispara el deploy.
   * Los errores de cada paso se identifican en el mensaje.
   */
  async updateServiceImage(
    serviceId: string,
    environmentId: string,
    newImage: string,
    numReplicas: number,
  ): Promise<void> {
    try {
      await this.updateServiceInstance(serviceId, environmentId, newImage, numReplicas);
    } catch (error) {
      throw new RailwayApiError(`failed to update service instance: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      await this.deployServiceInstance(serviceId, environmentId);
    } catch (error) {
      throw new RailwayApiError(`failed to deploy service instance: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async updateServiceInstance(
    serviceId: string,
    environmentId: string,
    newImage: string,
    numReplicas: number,
  ): Promise<void> {
    const input: JsonObject = {
      source: { image: newImage },
      numReplicas,
    };

    const { registryCredentials } = this.config;
    if (registryCredentials) {
      input.registryCredentials = {
        username: registryCredentials.username,
        password: registryCredentials.password,
      };
    }

    await this.execute('ServiceInstanceUpdate', SERVICE_INSTANCE_UPDATE_MUTATION, {
      environmentId,
      serviceId,
      input,
    });
  }

  async deployServiceInstance(serviceId: string, environmentId: string): Promise<void> {
    await this.execute('ServiceInstanceDeploy', SERVICE_INSTANCE_DEPLOY_MUTATION, {
      serviceId,
      environmentId,
      latestCommit: false,
    });
  }

  private replicasFor(node: ServiceInstanceNode): number {
    const { replicas, region, reason } = resolveReplicas(node.meta);
    if (region) {
      this.logger.debug(`Réplicas de ${node.serviceName}: region=${region} numReplicas=${replicas}`);
    } else if (reason === 'unparseable deployment meta') {
      this.logger.warn(`No se pudo leer el meta de ${node.serviceName}, usando ${replicas} réplica(s)`);
    } else {
      this.logger.debug(`Réplicas de ${node.serviceName}: ${reason}, usando ${replicas}`);
    }
    return replicas;
  }

  /**
   * Ejecuta una operación GraphQL y devuelve su `data`.
   * No se loguean cuerpos de request: el input puede llevar credenciales del registry.
   */
  private async execute(
    operationName: string,
    query: string,
    variables: JsonObject,
  ): Promise<JsonObject> {
    let response: Response;
    try {
      response = await fetch(this.config.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiToken}`,
        },
        body: JSON.stringify({ query, variables, operationName }),
      });
    } catch (error) {
      throw new RailwayApiError(`failed to execute request: ${errorMessage(error)}`, { cause: error });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new RailwayApiError(`failed to read response: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug(`${operationName} respondió con status ${response.status}`);

    if (response.status !== 200) {
      throw new RailwayApiError(`API returned status ${response.status}: ${body}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new RailwayApiError(`failed to unmarshal response: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!isJsonObject(payload)) {
      throw new RailwayApiError('failed to unmarshal response: expected a JSON object');
    }

    const { errors, data } = payload;
    if (Array.isArray(errors) && errors.length > 0) {
      const [first] = errors;
      const message = isJsonObject(first) && typeof first.message === 'string' ? first.message : 'unknown error';
      throw new RailwayApiError(`GraphQL error: ${message}`);
    }

    if (!isJsonObject(data)) {
      throw new RailwayApiError(`${operationName} returned no data`);
    }
    return data;
  }
}

function parseServiceInstancesPage(data: JsonObject): ServiceInstancesPage {
  const environment = data.environment;
  if (!isJsonObject(environment)) {
    throw new RailwayApiError('failed to parse services: environment not found');
  }

  const serviceInstances = environment.serviceInstances;
  const edges: unknown = isJsonObject(serviceInstances) ? serviceInstances.edges : undefined;
  if (!isJsonObject(serviceInstances) || !Array.isArray(edges)) {
    throw new RailwayApiError('failed to parse services: missing serviceInstances');
  }

  const nodes = edges.map((edge: unknown, index: number) => parseServiceInstanceNode(edge, index));

  const pageInfo: JsonObject = isJsonObject(serviceInstances.pageInfo) ? serviceInstances.pageInfo : {};
  const endCursor = pageInfo.endCursor;
  const projectId = environment.projectId;

  return {
    projectId: typeof projectId === 'string' ? projectId : undefined,
    nodes,
    endCursor: typeof endCursor === 'string' ? endCursor : null,
    hasNextPage: pageInfo.hasNextPage === true,
  };
}

function parseServiceInstanceNode(edge: unknown, index: number): ServiceInstanceNode {
  const node = isJsonObject(edge) ? edge.node : undefined;
  if (!isJsonObject(node)) {
    throw new RailwayApiError(`failed to parse services: malformed service instance at index ${index}`);
  }

  const { serviceId, serviceName } = node;
  if (typeof serviceId !== 'string' || typeof serviceName !== 'string') {
    throw new RailwayApiError(`failed to parse services: malformed service instance at index ${index}`);
  }

  const source: JsonObject = isJsonObject(node.source) ? node.source : {};
  const latestDeployment: JsonObject = isJsonObject(node.latestDeployment) ? node.latestDeployment : {};
  const image = source.image;

  return {
    serviceId,
    serviceName,
    image: typeof image === 'string' ? image : null,
    meta: latestDeployment.meta,
  };
}
