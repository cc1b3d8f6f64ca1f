/**
 * Decrypto API - App Module
 */

import { Module } from '@nestjs/common';
import { DecryptoConfigModule } from '@decrypto/common/config';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { EventModule } from './event/event.module';
import { BootstrapModule } from './bootstrap/bootstrap.module';
import { HealthController } from './health.controller';

@Module({
  imports: [DecryptoConfigModule, BootstrapModule, AuthModule, UsersModule, EventModule],
  controllers: [HealthController],
})
export class AppModule {}
