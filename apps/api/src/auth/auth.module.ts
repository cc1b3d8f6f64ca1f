/**
 * Decrypto Auth Module
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@decrypto/common/crypto';
import { AccessModule } from './access.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';

@Module({
  imports: [AccessModule, CryptoModule],
  controllers: [AuthController],
  providers: [AuthService],
})
export class AuthModule {}
