/**
 * Decrypto Users Controller
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { Identity, UserProfile, toUserProfile } from '@decrypto/common/types';
import { AccessGuard } from '../auth/guards/access.guard';
import { Access } from '../auth/decorators/access.decorator';
import { CurrentIdentity } from '../auth/decorators/current-identity.decorator';
import { POLICIES } from '../auth/access-policy';
import { UsersService } from './users.service';
import { CreateUserDto, RegisterUserDto } from './dto/register-user.dto';
import { ChangePasswordDto } from './dto/change-password.dto';
import { ListUsersQueryDto, UpdateProfileDto } from './dto/update-profile.dto';

@Controller('users')
@UseGuards(AccessGuard)
export class UsersController {
  constructor(private usersService: UsersService) {}

  @Post('open')
  @Access(POLICIES.PUBLIC)
  async register(@Body() dto: RegisterUserDto): Promise<UserProfile> {
    return this.usersService.register(dto);
  }

  @Post()
  @Access(POLICIES.SUPERUSER)
  async create(@Body() dto: CreateUserDto): Promise<UserProfile> {
    return this.usersService.create(dto);
  }

  @Get()
  @Access(POLICIES.SUPERUSER)
  async list(@Query() query: ListUsersQueryDto): Promise<UserProfile[]> {
    return this.usersService.list(query);
  }

  @Get('me')
  me(@CurrentIdentity() identity: Identity): UserProfile {
    return toUserProfile(identity);
  }

  @Put('me')
  async updateMe(
    @CurrentIdentity() identity: Identity,
    @Body() dto: UpdateProfileDto,
  ): Promise<UserProfile> {
    return this.usersService.updateProfile(identity, dto);
  }

  @Put('me/password')
  @HttpCode(HttpStatus.NO_CONTENT)
  async changePassword(
    @CurrentIdentity() identity: Identity,
    @Body() dto: ChangePasswordDto,
  ): Promise<void> {
    await this.usersService.changePassword(identity, dto);
  }

  @Get(':id')
  async getById(
    @CurrentIdentity() identity: Identity,
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<UserProfile> {
    return this.usersService.getProfile(identity, id);
  }

  @Post(':id/deactivate')
  @Access(POLICIES.SUPERUSER)
  @HttpCode(HttpStatus.OK)
  async deactivate(@Param('id', new ParseUUIDPipe()) id: string): Promise<UserProfile> {
    return this.usersService.deactivate(id);
  }
}
