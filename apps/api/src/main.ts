// Entry point. Secrets first, then the app module.
import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { loadSsmEnv } from './lib/ssm-env';

const logger = new Logger('Bootstrap');

const corsAllowed = (process.env.CORS_ALLOWED_ORIGINS ?? '')
  .split(',')
  .map((s) => s.trim())
  .filter(Boolean);

async function bootstrap() {
  // Parameter Store only on AWS hosts (EC2/Lambda)
  const isProd = process.env.NODE_ENV === 'production' && process.env.AWS_EXECUTION_ENV === 'true';

  if (isProd) {
    logger.log('[SSM] Loading parameters from SSM...');
    const loaded = await loadSsmEnv();
    logger.log(`[SSM] Loaded ${loaded.join(', ') || 'nothing'}`);
  } else {
    logger.log('[SSM] Skipping SSM load (non-AWS env)');
  }

  // ConfigModule validates process.env at import time, so this has to follow SSM.
  const { AppModule } = await import('./module');

  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const prefix = process.env.GLOBAL_PREFIX ?? '';
  if (prefix) app.setGlobalPrefix(prefix, { exclude: ['health', 'health/ready'] });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.enableCors({
    origin(origin, cb) {
      // server-to-server calls carry no origin
      if (!origin) return cb(null, true);
      if (corsAllowed.includes(origin)) return cb(null, true);
      return cb(new Error('CORS blocked'), false);
    },
    allowedHeaders: ['Content-Type'],
  });

  const port = Number(process.env.PORT ?? 4000);
  await app.listen(port);
  logger.log(`API on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  logger.error('Bootstrap failed', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
