import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { DEFAULT_PORT } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  configureApp(app);

  const config = new DocumentBuilder()
    .setTitle('Image Version Updater API')
    .setDescription('Actualiza el tag de imagen de los servicios de un entorno de Railway y dispara el redeploy')
    .setVersion('1.0')
    .addTag('update')
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'Token',
        description: 'Ingresa tu UPDATE_API_TOKEN (solo si está configurado)',
      },
      'bearer',
    )
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = app.get(ConfigService).get<number>('PORT') ?? DEFAULT_PORT;
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`Servidor escuchando en el puerto ${port}`);
  logger.log(`Swagger UI disponible en: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `No se pudo iniciar el servidor: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
