import { NestExpressApplication } from '@nestjs/platform-express';
import { HttpErrorFilter } from './common/filters/http-exception.filter';
import { createValidationPipe } from './common/validation';

/** Pipes, filtros y parsers globales, compartidos por main.ts y los tests e2e. */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  // El body se lee como JSON aunque el cliente mande otro Content-Type;
  // application/json y formularios ya los resuelven los parsers por defecto
  app.useBodyParser('json', { type: () => true });
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new HttpErrorFilter());
  return app;
}
