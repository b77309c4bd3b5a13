import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RailwayClient } from './railway.client';
import { RAILWAY_CLIENT_CONFIG, railwayClientConfigFactory } from './railway.config';

@Module({
  providers: [
    {
      provide: RAILWAY_CLIENT_CONFIG,
      useFactory: railwayClientConfigFactory,
      inject: [ConfigService],
    },
    RailwayClient,
  ],
  exports: [RailwayClient],
})
export class RailwayModule {}
