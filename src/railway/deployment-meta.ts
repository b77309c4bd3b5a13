import { isJsonObject, JsonObject } from './railway.types';

export const DEFAULT_REPLICA_COUNT = 1;

export interface ReplicaResolution {
  replicas: number;
  /** Región de la que salió el valor; ausente cuando se usa el default */
  region?: string;
  reason?: string;
}

type MetaDecoder = (raw: unknown) => JsonObject | undefined;

const decodeStructured: MetaDecoder = (raw) => (isJsonObject(raw) ? raw : undefined);

// Railway a veces entrega meta como string con el JSON serializado otra vez
const decodeEncodedString: MetaDecoder = (raw) => {
  if (typeof raw !== 'string') {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  return isJsonObject(parsed) ? parsed : undefined;
};

const META_DECODERS: readonly MetaDecoder[] = [decodeStructured, decodeEncodedString];

export function decodeDeploymentMeta(raw: unknown): JsonObject | undefined {
  for (const decode of META_DECODERS) {
    const meta = decode(raw);
    if (meta) {
      return meta;
    }
  }
  return undefined;
}

/**
 * Obtiene la cantidad de réplicas desde
 * meta.serviceManifest.deploy.multiRegionConfig.<region>.numReplicas.
 * Se queda con la primera región que reporte un valor >= 1.
 */
export function resolveReplicas(rawMeta: unknown): ReplicaResolution {
  if (rawMeta === null || rawMeta === undefined) {
    return { replicas: DEFAULT_REPLICA_COUNT, reason: 'no deployment meta' };
  }

  const meta = decodeDeploymentMeta(rawMeta);
  if (!meta) {
    return { replicas: DEFAULT_REPLICA_COUNT, reason: 'unparseable deployment meta' };
  }

  const serviceManifest = meta['serviceManifest'];
  if (!isJsonObject(serviceManifest)) {
    return { replicas: DEFAULT_REPLICA_COUNT, reason: 'no serviceManifest' };
  }

  const deploy = serviceManifest['deploy'];
  if (!isJsonObject(deploy)) {
    return { replicas: DEFAULT_REPLICA_COUNT, reason: 'no deploy config' };
  }

  const multiRegionConfig = deploy['multiRegionConfig'];
  if (!isJsonObject(multiRegionConfig)) {
    return { replicas: DEFAULT_REPLICA_COUNT, reason: 'no multiRegionConfig' };
  }

  for (const [region, regionConfig] of Object.entries(multiRegionConfig)) {
    if (!isJsonObject(regionConfig)) {
      continue;
    }
    const numReplicas = regionConfig['numReplicas'];
    if (typeof numReplicas === 'number' && Number.isFinite(numReplicas) && numReplicas >= 1) {
      return { replicas: Math.trunc(numReplicas), region };
    }
  }

  return {
    replicas: DEFAULT_REPLICA_COUNT,
    reason: 'no valid numReplicas in multiRegionConfig',
  };
}

export function resolveReplicaCount(rawMeta: unknown): number {
  return resolveReplicas(rawMeta).replicas;
}
