/**
 * Access Module
 * Shares the guard, its decision service and the event clock with every
 * feature module that protects routes
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventClockModule } from '@decrypto/common/event';
import { JwtModule } from '@decrypto/common/jwt';
import { UserStoreModule } from '../users/user-store.module';
import { AccessControlService } from './access-control.service';
import { AccessGuard } from './guards/access.guard';

@Module({
  imports: [ConfigModule, JwtModule, EventClockModule, UserStoreModule],
  providers: [AccessControlService, AccessGuard],
  exports: [AccessControlService, AccessGuard, EventClockModule, JwtModule, UserStoreModule],
})
export class AccessModule {}
