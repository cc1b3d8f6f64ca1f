/**
 * Decrypto Utils Controller
 * Event start/end timestamps for clients rendering countdowns
 */

import { Controller, Get } from '@nestjs/common';
import { EventClockService } from '@decrypto/common/event';

export interface TimestampResponse {
  timestamp: string;
}

@Controller('utils')
export class UtilsController {
  constructor(private eventClockService: EventClockService) {}

  @Get('start-time')
  startTime(): TimestampResponse {
    return { timestamp: this.eventClockService.window.start.toISOString() };
  }

  @Get('end-time')
  endTime(): TimestampResponse {
    return { timestamp: this.eventClockService.window.end.toISOString() };
  }
}
