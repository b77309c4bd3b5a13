import { InternalServerErrorException } from '@nestjs/common';

export interface ServiceUpdateFailureBody {
  error: string;
  updated_services: string[];
}

/**
 * Falla remota durante una actualización. Conserva los servicios que ya se
 * actualizaron antes del error: esos cambios no se revierten.
 */
export class ServiceUpdateFailedException extends InternalServerErrorException {
  readonly updatedServices: readonly string[];

  constructor(reason: string, updatedServices: readonly string[], cause?: unknown) {
    const body: ServiceUpdateFailureBody = {
      error: `Failed to update services: ${reason}`,
      updated_services: [...updatedServices],
    };
    super(body, { cause });
    this.updatedServices = updatedServices;
  }
}
