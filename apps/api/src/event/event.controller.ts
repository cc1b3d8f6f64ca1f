/**
 * Decrypto Event Controller
 */

import { Controller, Get, UseGuards } from '@nestjs/common';
import { EventClockService, EventPhase } from '@decrypto/common/event';
import { Identity, UserProfile, toUserProfile } from '@decrypto/common/types';
import { AccessGuard } from '../auth/guards/access.guard';
import { Access } from '../auth/decorators/access.decorator';
import { CurrentIdentity } from '../auth/decorators/current-identity.decorator';
import { POLICIES } from '../auth/access-policy';

export interface EventPhaseResponse {
  phase: EventPhase;
  start_time: string;
  end_time: string;
  server_time: string;
}

export interface EventStatusResponse {
  phase: EventPhase;
  remaining_seconds: number;
  user: UserProfile;
}

@Controller('event')
@UseGuards(AccessGuard)
export class EventController {
  constructor(private eventClockService: EventClockService) {}

  @Get('phase')
  @Access(POLICIES.PUBLIC)
  phase(): EventPhaseResponse {
    // One reading of the clock so phase and server_time agree
    const now = this.eventClockService.now();
    const { start, end } = this.eventClockService.window;

    return {
      phase: this.eventClockService.phase(now),
      start_time: start.toISOString(),
      end_time: end.toISOString(),
      server_time: now.toISOString(),
    };
  }

  /**
   * Only reachable while the event runs (superusers excepted)
   */
  @Get('status')
  @Access(POLICIES.ACTIVE_EVENT)
  status(@CurrentIdentity() identity: Identity): EventStatusResponse {
    const now = this.eventClockService.now();

    return {
      phase: this.eventClockService.phase(now),
      remaining_seconds: this.eventClockService.secondsRemaining(now),
      user: toUserProfile(identity),
    };
  }
}
