import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const cfg = app.get(ConfigService);
  const corsOrigins = (cfg.get<string>('CORS_ORIGINS') ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  app.enableCors({
    origin: corsOrigins.length ? corsOrigins : true,
    credentials: true,
  });

  // DTO validation for the intake routes; the webhook body is read as unknown
  app.useGlobalPipes(createValidationPipe());

  const port = Number(cfg.get<string>('PORT') ?? 3000);
  await app.listen(port, '0.0.0.0');
  const baseUrl = cfg.get<string>('APP_BASE_URL') ?? `http://localhost:${port}`;
  new Logger('Bootstrap').log(`🚀 Bot listening on ${baseUrl}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`Startup failed: ${String(err)}`);
  process.exit(1);
});
