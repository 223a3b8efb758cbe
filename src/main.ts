import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  app.enableCors();
  app.enableShutdownHooks();
  app.useWebSocketAdapter(new IoAdapter(app));

  const config = new DocumentBuilder()
    .setTitle('Ontology Collaboration API')
    .setDescription(
      'Snapshots, visible graph and presence. Live editing runs over the Socket.IO namespace /ontology.',
    )
    .setVersion('0.1.0')
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, config));

  const port = parseInt(process.env.PORT || '3000');
  await app.listen(port);
  logger.log(`🚀 Listening on port ${port}, docs at /docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('❌ Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
