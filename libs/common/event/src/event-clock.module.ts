/**
 * Event Clock Module
 * The window is read from configuration once, at startup
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ClockModule } from '@decrypto/common/clock';
import { EventWindowConfig } from '@decrypto/common/config';
import { EventClockService } from './event-clock.service';
import { EVENT_WINDOW } from './event.types';
import { createEventWindow } from './event-window';

@Module({
  imports: [ConfigModule, ClockModule],
  providers: [
    {
      provide: EVENT_WINDOW,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const event = config.getOrThrow<EventWindowConfig>('event');
        return createEventWindow(event.start, event.end);
      },
    },
    EventClockService,
  ],
  exports: [EventClockService, ClockModule],
})
export class EventClockModule {}
