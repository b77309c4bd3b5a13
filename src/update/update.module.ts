import { Module } from '@nestjs/common';
import { RailwayModule } from '../railway/railway.module';
import { UpdateTokenGuard } from './guards/update-token.guard';
import { UpdateController } from './update.controller';
import { UpdateService } from './update.service';

@Module({
  imports: [RailwayModule],
  controllers: [UpdateController],
  providers: [UpdateService, UpdateTokenGuard],
})
export class UpdateModule {}
