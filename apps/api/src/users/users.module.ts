/**
 * Decrypto Users Module
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@decrypto/common/crypto';
import { AccessModule } from '../auth/access.module';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';

@Module({
  imports: [AccessModule, CryptoModule],
  controllers: [UsersController],
  providers: [UsersService],
})
export class UsersModule {}
