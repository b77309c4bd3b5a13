/**
 * Fallo de una llamada a la API GraphQL de Railway: red, status distinto de 200,
 * cuerpo ilegible, error GraphQL o respuesta con forma inesperada.
 */
export class RailwayApiError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RailwayApiError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
