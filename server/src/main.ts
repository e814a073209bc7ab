import 'reflect-metadata';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AllExceptionsFilter } from './common/all-exceptions.filter';
import { APP_ENVIRONMENT, type AppEnvironment } from './config/scan.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  if (process.env.NODE_ENV !== 'production') {
    app.enableCors({ methods: ['GET'] });
  }

  const adapterHost = app.get(HttpAdapterHost);
  app.useGlobalFilters(new AllExceptionsFilter(adapterHost));
  app.enableShutdownHooks();

  const env = app.get<AppEnvironment>(APP_ENVIRONMENT);
  await app.listen(env.port);
}
void bootstrap();
