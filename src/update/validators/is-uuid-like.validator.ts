import { ValidateBy, ValidationOptions } from 'class-validator';

const URN_PREFIX = 'urn:uuid:';
const CANONICAL_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Lleva un UUID a su forma canónica con guiones.
 * Acepta la forma con guiones, 32 dígitos hex, entre llaves o con prefijo `urn:uuid:`.
 */
export function normalizeUuid(value: string): string | undefined {
  let candidate = value;
  if (candidate.toLowerCase().startsWith(URN_PREFIX)) {
    candidate = candidate.slice(URN_PREFIX.length);
  } else if (candidate.startsWith('{') && candidate.endsWith('}')) {
    candidate = candidate.slice(1, -1);
  }

  if (/^[0-9a-f]{32}$/i.test(candidate)) {
    candidate = [
      candidate.slice(0, 8),
      candidate.slice(8, 12),
      candidate.slice(12, 16),
      candidate.slice(16, 20),
      candidate.slice(20),
    ].join('-');
  }

  return CANONICAL_UUID.test(candidate) ? candidate.toLowerCase() : undefined;
}

export function IsUuidLike(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isUuidLike',
      validator: {
        validate: (value: unknown): boolean =>
          typeof value === 'string' && normalizeUuid(value) !== undefined,
        defaultMessage: () => '$property must be a valid UUID',
      },
    },
    validationOptions,
  );
}
