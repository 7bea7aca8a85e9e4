import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });
  app.enableShutdownHooks();

  // Validación global (class-validator)
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.enableCors({
    origin: '*',
    methods: 'GET,POST',
  });

  // Swagger
  const config = new DocumentBuilder()
    .setTitle('Company Contacts Scraper API')
    .setDescription(
      'Encuentra la web oficial de empresas indias y extrae sus datos de contacto.\n\n' +
      '**Pipeline:** búsqueda (DuckDuckGo) → home/about/contacto (HTTP → bypass → Chromium) → ' +
      'emails, teléfonos, dirección, GSTIN, CIN → fallback a JustDial / IndiaMART.\n\n' +
      '**Autenticación:** Header `x-api-key` requerido en todos los endpoints excepto `/contacts/health`.',
    )
    .setVersion('1.0')
    .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'x-api-key')
    .addTag('Contacts', 'Lotes de empresas y estado del servicio')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = process.env.SCRAPER_PORT || 3457;
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`🚀 Contacts Scraper API corriendo en http://localhost:${port}`);
  logger.log(`📚 Swagger docs en http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`❌ No se pudo iniciar: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
