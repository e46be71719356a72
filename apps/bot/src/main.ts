import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { resolveLogLevels } from '@libs/core';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  const configService = app.get(ConfigService);
  app.enableShutdownHooks();

  const rawPort = process.env.PORT ?? configService.get<string>('PORT') ?? '3000';
  const parsedPort = Number(rawPort);
  const port = Number.isFinite(parsedPort) && parsedPort > 0 ? parsedPort : 3000;
  await app.listen(port, '0.0.0.0');
  Logger.log(`${configService.get<string>('APP_NAME', 'market-dashboard-bot')} listening on ${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error('Bootstrap failed', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
