import { ServiceDescriptor } from '../railway/railway.types';

export interface ImageUpdatePlan {
  service: ServiceDescriptor;
  matchedPrefix: string;
  newImage: string;
}

/** Primer prefijo (en el orden recibido) con el que empieza la imagen. */
export function findMatchingPrefix(image: string, prefixes: readonly string[]): string | undefined {
  return prefixes.find((prefix) => image.startsWith(prefix));
}

export function matchesPrefix(image: string, prefixes: readonly string[]): boolean {
  return findMatchingPrefix(image, prefixes) !== undefined;
}

/**
 * Reemplaza lo que sigue al último `:` por la nueva versión, o la agrega si no hay tag.
 * Si el resultado ya no empieza con el prefijo que matcheó, queda `<prefijo>:<versión>`.
 */
export function rewriteImageTag(image: string, matchedPrefix: string, newVersion: string): string {
  const separator = image.lastIndexOf(':');
  const repository = separator === -1 ? image : image.slice(0, separator);
  const rewritten = `${repository}:${newVersion}`;

  if (!rewritten.startsWith(matchedPrefix)) {
    return `${matchedPrefix}:${newVersion}`;
  }
  return rewritten;
}

export function planImageUpdates(
  services: readonly ServiceDescriptor[],
  prefixes: readonly string[],
  newVersion: string,
): ImageUpdatePlan[] {
  const plans: ImageUpdatePlan[] = [];
  for (const service of services) {
    const matchedPrefix = findMatchingPrefix(service.image, prefixes);
    if (matchedPrefix === undefined) {
      continue;
    }
    plans.push({
      service,
      matchedPrefix,
      newImage: rewriteImageTag(service.image, matchedPrefix, newVersion),
    });
  }
  return plans;
}
