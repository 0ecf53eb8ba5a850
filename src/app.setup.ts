import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

export const CORS_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'];

/**
 * HTTP concerns shared by main.ts and the e2e tests: CORS and the API docs.
 */
export function configureApp(app: NestFastifyApplication): void {
  app.enableCors({
    origin: '*',
    methods: CORS_METHODS,
    allowedHeaders: ['Content-Type'],
    optionsSuccessStatus: 200,
  });

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Board API')
    .setDescription('CRUD over test projects')
    .setVersion('1.0.0')
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('swagger', app, document, {
    jsonDocumentUrl: 'swagger.json',
  });
}
