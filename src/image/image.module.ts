import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ImageService } from './image.service';
import { ImageController } from './image.controller';
import { PropertyImage } from './entities/property-image.entity';
import { Property } from '../property/entities/property.entity';

@Module({
  imports: [TypeOrmModule.forFeature([PropertyImage, Property]), ConfigModule],
  controllers: [ImageController],
  providers: [ImageService],
})
export class ImageModule { }
