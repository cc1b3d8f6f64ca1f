import { Module } from '@nestjs/common';
import { AccessModule } from '../auth/access.module';
import { EventController } from './event.controller';
import { UtilsController } from './utils.controller';

@Module({
  imports: [AccessModule],
  controllers: [EventController, UtilsController],
})
export class EventModule {}
