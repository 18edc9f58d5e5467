import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ImportCliModule } from './import/import-cli.module';
import { ImportCommand } from './import/import.command';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(ImportCliModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const exitCode = await app.get(ImportCommand).run(process.argv.slice(2));
    process.exitCode = exitCode;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
