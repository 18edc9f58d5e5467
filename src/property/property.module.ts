import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PropertyService } from './property.service';
import { PropertyController } from './property.controller';
import { Property } from './entities/property.entity';
import { Location } from '../location/entities/location.entity';
import { PropertyImage } from '../image/entities/property-image.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Property, Location, PropertyImage]), ConfigModule],
  controllers: [PropertyController],
  providers: [PropertyService],
})
export class PropertyModule { }
