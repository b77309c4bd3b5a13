import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../railway/railway-api.error';
import { RailwayClient } from '../railway/railway.client';
import { EnvironmentServices } from '../railway/railway.types';
import { UpdateRequestDto } from './dto/update-request.dto';
import { planImageUpdates } from './image-tag';
import { ServiceUpdateFailedException } from './update.exceptions';
import { normalizeUuid } from './validators/is-uuid-like.validator';

@Injectable()
export class UpdateService {
  private readonly logger = new Logger(UpdateService.name);

  constructor(private readonly railwayClient: RailwayClient) {}

  /**
   * Actualiza, uno por uno y en orden, los servicios del entorno cuya imagen
   * empieza con alguno de los prefijos. Se detiene en el primer error.
   * @returns nombres de los servicios actualizados; vacío si ninguno matcheó
   */
  async updateServices(request: UpdateRequestDto): Promise<string[]> {
    const { image_prefixes: prefixes, new_version: newVersion } = request;
    const environmentId = normalizeUuid(request.environment_id) ?? request.environment_id;

    let environment: EnvironmentServices;
    try {
      environment = await this.railwayClient.listServices(environmentId);
    } catch (error) {
      this.logger.error(`No se pudieron listar los servicios de ${environmentId}: ${errorMessage(error)}`);
      throw new ServiceUpdateFailedException(`failed to get services: ${errorMessage(error)}`, [], error);
    }
    this.warnOnProjectMismatch(request.project_id, environment);

    const plans = planImageUpdates(environment.services, prefixes, newVersion);
    this.logger.log(
      `${plans.length} de ${environment.services.length} servicio(s) coinciden con [${prefixes.join(', ')}]`,
    );

    const updated: string[] = [];
    for (const { service, newImage } of plans) {
      this.logger.log(
        `Actualizando ${service.name} de ${service.image} a ${newImage} (replicas=${service.numReplicas})`,
      );
      try {
        await this.railwayClient.updateServiceImage(service.id, environmentId, newImage, service.numReplicas);
      } catch (error) {
        const reason = `failed to update service ${service.name}: ${errorMessage(error)}`;
        this.logger.error(`${reason} (ya actualizados: ${updated.length})`);
        throw new ServiceUpdateFailedException(reason, updated, error);
      }
      updated.push(service.name);
    }

    return updated;
  }

  private warnOnProjectMismatch(projectId: string, environment: EnvironmentServices): void {
    if (!environment.projectId) {
      return;
    }
    if (normalizeUuid(projectId) !== normalizeUuid(environment.projectId)) {
      this.logger.warn(
        `El entorno ${environment.environmentId} pertenece al proyecto ${environment.projectId}, no a ${projectId}`,
      );
    }
  }
}
