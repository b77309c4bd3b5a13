export type JsonObject = Record<string, unknown>;

export interface ServiceDescriptor {
  /** serviceId de Railway, el que reciben las mutaciones */
  id: string;
  name: string;
  image: string;
  numReplicas: number;
}

export interface EnvironmentServices {
  environmentId: string;
  projectId?: string;
  services: ServiceDescriptor[];
}

export interface ServiceInstanceNode {
  serviceId: string;
  serviceName: string;
  image: string | null;
  meta: unknown;
}

export interface ServiceInstancesPage {
  projectId?: string;
  nodes: ServiceInstanceNode[];
  endCursor: string | null;
  hasNextPage: boolean;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
