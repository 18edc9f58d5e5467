import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { DatabaseModule } from './database/database.module';
import { LocationModule } from './location/location.module';
import { PropertyModule } from './property/property.module';
import { ImageModule } from './image/image.module';
import { readPositiveInt } from './common/utils/config.util';

@Module({
  imports: [

    // configrations
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),

    // Rate limiting
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => [
        {
          ttl: readPositiveInt(config, 'THROTTLE_TTL', 60000),
          limit: readPositiveInt(config, 'THROTTLE_LIMIT', 100),
        },
      ],
    }),
    DatabaseModule,
    LocationModule,
    PropertyModule,
    ImageModule,
  ],
})
export class AppModule { }
