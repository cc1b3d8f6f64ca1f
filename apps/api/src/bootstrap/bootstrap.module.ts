import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CryptoModule } from '@decrypto/common/crypto';
import { UserStoreModule } from '../users/user-store.module';
import { FirstSuperuserInitializer } from './first-superuser.initializer';

@Module({
  imports: [ConfigModule, CryptoModule, UserStoreModule],
  providers: [FirstSuperuserInitializer],
})
export class BootstrapModule {}
