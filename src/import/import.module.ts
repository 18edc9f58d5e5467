import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ImportService } from './import.service';
import { ImportCommand } from './import.command';

@Module({
  imports: [ConfigModule],
  providers: [ImportService, ImportCommand],
  exports: [ImportCommand],
})
export class ImportModule { }
