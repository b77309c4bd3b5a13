import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common';

// Orden en que se reportan los campos de PUT /update
const FIELD_ORDER = ['project_id', 'environment_id', 'image_prefixes', 'new_version'];

function fieldRank(error: ValidationError): number {
  const rank = FIELD_ORDER.indexOf(error.property);
  return rank === -1 ? FIELD_ORDER.length : rank;
}

function firstMessage(error: ValidationError): string | undefined {
  const [message] = Object.values(error.constraints ?? {});
  if (message) {
    return message;
  }
  for (const child of error.children ?? []) {
    const childMessage = firstMessage(child);
    if (childMessage) {
      return childMessage;
    }
  }
  return undefined;
}

/** Reporta un único error: el del primer campo inválido. */
export function firstValidationErrorFactory(errors: ValidationError[]): BadRequestException {
  const [first] = [...errors].sort((a, b) => fieldRank(a) - fieldRank(b));
  const message = (first && firstMessage(first)) ?? 'Invalid request body';
  return new BadRequestException(message);
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: firstValidationErrorFactory,
  });
}
