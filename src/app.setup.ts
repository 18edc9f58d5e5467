import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpExceptionFilter } from './common/filter/http-exception.filter';
import { TypeOrmExceptionFilter } from './common/filter/typeorm-exception.filter';

/** Prefix, CORS, validation and error filters; shared by the server and the e2e tests. */
export function configureApp(app: INestApplication): string {
  const configService = app.get(ConfigService);

  //Global Prefix for all routes
  const apiPrefix = configService.get<string>('API_PREFIX') || 'api';
  app.setGlobalPrefix(apiPrefix);

  // Enable CORS
  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN') || '*',
  });

  //Global Validation Pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Filters run last-registered first: database errors before the catch-all
  app.useGlobalFilters(new HttpExceptionFilter(), new TypeOrmExceptionFilter());

  return apiPrefix;
}
