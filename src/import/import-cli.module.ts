import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '../database/database.module';
import { ImportModule } from './import.module';

// Application context for the import commands: no HTTP layer
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env' }), DatabaseModule, ImportModule],
})
export class ImportCliModule { }
