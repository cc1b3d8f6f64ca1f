/**
 * Decrypto Auth Controller
 * Token endpoints
 */

import { Controller, Post, Body, HttpCode, HttpStatus, UseGuards } from '@nestjs/common';
import { AccessTokenResponse } from '@decrypto/common/jwt';
import { Identity, UserProfile, toUserProfile } from '@decrypto/common/types';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { AccessGuard } from './guards/access.guard';
import { Access } from './decorators/access.decorator';
import { CurrentIdentity } from './decorators/current-identity.decorator';
import { POLICIES } from './access-policy';

@Controller('login')
@UseGuards(AccessGuard)
export class AuthController {
  constructor(private authService: AuthService) {}

  @Post('access-token')
  @Access(POLICIES.PUBLIC)
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<AccessTokenResponse> {
    return this.authService.login(dto);
  }

  @Post('test-token')
  @HttpCode(HttpStatus.OK)
  testToken(@CurrentIdentity() identity: Identity): UserProfile {
    return toUserProfile(identity);
  }

  @Post('refresh-token')
  @HttpCode(HttpStatus.OK)
  refresh(@CurrentIdentity() identity: Identity): AccessTokenResponse {
    return this.authService.refresh(identity);
  }
}
