/**
 * Event Clock Service
 * Resolves the event phase against the configured window
 */

import { Inject, Injectable } from '@nestjs/common';
import { CLOCK, Clock } from '@decrypto/common/clock';
import { EVENT_WINDOW, EventPhase, EventWindow } from './event.types';
import { resolvePhase } from './event-window';

@Injectable()
export class EventClockService {
  constructor(
    @Inject(EVENT_WINDOW) private readonly eventWindow: EventWindow,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  get window(): EventWindow {
    return this.eventWindow;
  }

  now(): Date {
    return this.clock.now();
  }

  phase(now: Date = this.clock.now()): EventPhase {
    return resolvePhase(this.eventWindow, now);
  }

  /**
   * Whole seconds left until the event ends (0 once it is over)
   */
  secondsRemaining(now: Date = this.clock.now()): number {
    const remainingMs = this.eventWindow.end.getTime() - now.getTime();
    return remainingMs > 0 ? Math.floor(remainingMs / 1000) : 0;
  }
}
