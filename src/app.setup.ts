import { INestApplication, RequestMethod, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllExceptionsFilter, LoggingInterceptor } from '../libs/common';

/**
 * Global prefix, pipes, filter, interceptor and CORS shared by the server
 * and the HTTP-level tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  const configService = app.get(ConfigService);
  const apiPrefix = configService.get<string>('apiPrefix', 'api/v1');

  app.setGlobalPrefix(apiPrefix, {
    exclude: [
      { path: '/', method: RequestMethod.GET },
      { path: 'health', method: RequestMethod.GET },
    ],
  });
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(new AllExceptionsFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  const corsOrigin = configService.get<string[] | string>('cors.origin', '*');
  const corsCredentials = configService.get<boolean>('cors.credentials', false);
  app.enableCors({
    origin: corsOrigin,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: corsCredentials,
  });

  return app;
}
