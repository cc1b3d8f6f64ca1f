import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { ERRORS } from '@decrypto/common/errors';
import { Identity } from '@decrypto/common/types';
import { AuthenticatedRequest } from '../guards/access.guard';

/**
 * Identity resolved by AccessGuard for the current request
 */
export const CurrentIdentity = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Identity => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();

    if (!request.identity) {
      throw ERRORS.Unauthenticated();
    }

    return request.identity;
  },
);
