import { Module } from '@nestjs/common';
import { DatabaseModule } from '@decrypto/common/database';
import { PgUserStore } from './pg-user-store';
import { USER_STORE } from './user-store';

@Module({
  imports: [DatabaseModule],
  providers: [{ provide: USER_STORE, useClass: PgUserStore }],
  exports: [USER_STORE],
})
export class UserStoreModule {}
