/**
 * Decrypto JWT Module
 * Provides token issuance and validation
 */

import { Module } from '@nestjs/common';
import { JwtModule as NestJwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ClockModule } from '@decrypto/common/clock';
import { ERRORS } from '@decrypto/common/errors';
import { TokenService } from './token.service';

@Module({
  imports: [
    ConfigModule,
    ClockModule,
    NestJwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const secret = config.get<string>('jwtSecret');

        if (!secret) {
          throw ERRORS.ConfigurationError('JWT secret is required. Set SECRET_KEY in environment');
        }

        return {
          secret,
          signOptions: {
            // NOTE: no default expiresIn - exp is always set explicitly in claims
            algorithm: 'HS256',
          },
          verifyOptions: {
            algorithms: ['HS256'],
          },
        };
      },
    }),
  ],
  providers: [TokenService],
  exports: [TokenService],
})
export class JwtModule {}
