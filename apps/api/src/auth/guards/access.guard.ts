/**
 * Access Guard
 * - Fail-closed design (deny on error)
 * - Policy comes from @Access(); routes without one require authentication
 */

import { Injectable, CanActivate, ExecutionContext, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { EventClockService } from '@decrypto/common/event';
import { ERRORS } from '@decrypto/common/errors';
import { Identity } from '@decrypto/common/types';
import { AccessControlService } from '../access-control.service';
import { AccessPolicy, DenialReason, POLICIES } from '../access-policy';
import { ACCESS_POLICY_KEY } from '../decorators/access.decorator';

export interface AuthenticatedRequest extends Request {
  identity?: Identity | null;
}

@Injectable()
export class AccessGuard implements CanActivate {
  private readonly logger = new Logger(AccessGuard.name);

  constructor(
    private reflector: Reflector,
    private accessControlService: AccessControlService,
    private eventClockService: EventClockService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const policy =
      this.reflector.getAllAndOverride<AccessPolicy | undefined>(ACCESS_POLICY_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? POLICIES.AUTHENTICATED;

    const phase = this.eventClockService.phase();
    const decision = await this.accessControlService.authorize(
      this.extractTokenFromHeader(request),
      phase,
      policy,
    );

    if (!decision.allowed) {
      this.logger.warn(`${request.method} ${request.path} denied: ${decision.reason}`);

      switch (decision.reason) {
        case DenialReason.FORBIDDEN:
          throw ERRORS.Forbidden();
        case DenialReason.EVENT_NOT_ACTIVE:
          throw ERRORS.EventNotActive(phase);
        default:
          throw ERRORS.Unauthenticated();
      }
    }

    request.identity = decision.identity;
    return true;
  }

  /**
   * Extract Bearer token from Authorization header.
   * null when there is no header; a header that is not a well-formed bearer
   * credential yields '' so that validation rejects it.
   */
  private extractTokenFromHeader(request: Request): string | null {
    const authHeader = request.headers.authorization;

    if (authHeader === undefined) {
      return null;
    }

    const [type, token, ...rest] = authHeader.trim().split(/\s+/);

    if (type?.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
      return '';
    }

    return token;
  }
}
