import { ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { EventClockService, EventPhase } from '@decrypto/common/event';
import { DecryptoError, ErrorCode } from '@decrypto/common/errors';
import { Identity, UserRole } from '@decrypto/common/types';
import { AccessControlService } from '../access-control.service';
import { DenialReason, POLICIES } from '../access-policy';
import { Access } from '../decorators/access.decorator';
import { AccessGuard, AuthenticatedRequest } from './access.guard';

class Routes {
  @Access(POLICIES.SUPERUSER)
  administer() {
    return 'admin';
  }

  profile() {
    return 'me';
  }
}

describe('AccessGuard', () => {
  const identity: Identity = {
    id: '7d3b8c1e-5a4f-4e2b-9c6d-1f0e2a3b4c5d',
    email: 'player@example.com',
    username: 'player',
    full_name: 'Player One',
    password_hash: 'unused',
    role: UserRole.REGULAR,
    is_active: true,
    created_at: new Date('2021-12-01T00:00:00Z'),
    updated_at: new Date('2021-12-01T00:00:00Z'),
  };

  let authorize: jest.Mock;
  let phase: jest.Mock;
  let guard: AccessGuard;

  beforeEach(() => {
    authorize = jest.fn().mockResolvedValue({ allowed: true, identity });
    phase = jest.fn().mockReturnValue(EventPhase.ACTIVE);
    guard = new AccessGuard(
      new Reflector(),
      { authorize } as unknown as AccessControlService,
      { phase } as unknown as EventClockService,
    );
  });

  function contextFor(
    handler: () => string,
    authorization?: string,
  ): { context: ExecutionContext; request: Partial<AuthenticatedRequest> } {
    const request: Partial<AuthenticatedRequest> = {
      method: 'GET',
      path: '/api/v1/test',
      headers: authorization === undefined ? {} : { authorization },
    };
    const context = {
      getHandler: () => handler,
      getClass: () => Routes,
      switchToHttp: () => ({ getRequest: () => request }),
    } as unknown as ExecutionContext;
    return { context, request };
  }

  it('should require authentication when no policy is declared', async () => {
    const { context } = contextFor(Routes.prototype.profile);

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(authorize).toHaveBeenCalledWith(null, EventPhase.ACTIVE, POLICIES.AUTHENTICATED);
  });

  it('should pass the declared policy and bearer token', async () => {
    const { context } = contextFor(Routes.prototype.administer, 'Bearer header.payload.signature');

    await guard.canActivate(context);

    expect(authorize).toHaveBeenCalledWith(
      'header.payload.signature',
      EventPhase.ACTIVE,
      POLICIES.SUPERUSER,
    );
  });

  it('should accept the scheme in any case', async () => {
    const { context } = contextFor(Routes.prototype.profile, 'bearer abc');

    await guard.canActivate(context);

    expect(authorize).toHaveBeenCalledWith('abc', EventPhase.ACTIVE, POLICIES.AUTHENTICATED);
  });

  it.each(['Basic dXNlcjpwYXNz', 'Bearer', 'Bearer a b', ''])(
    'should turn the malformed header %p into an empty credential',
    async (authorization) => {
      const { context } = contextFor(Routes.prototype.profile, authorization);

      await guard.canActivate(context);

      expect(authorize).toHaveBeenCalledWith('', EventPhase.ACTIVE, POLICIES.AUTHENTICATED);
    },
  );

  it('should attach the resolved identity to the request', async () => {
    const { context, request } = contextFor(Routes.prototype.profile, 'Bearer abc');

    await guard.canActivate(context);

    expect(request.identity).toBe(identity);
  });

  it('should map each denial to its error', async () => {
    const { context } = contextFor(Routes.prototype.profile, 'Bearer abc');

    authorize.mockResolvedValueOnce({ allowed: false, reason: DenialReason.UNAUTHENTICATED });
    await expect(guard.canActivate(context)).rejects.toMatchObject({
      code: ErrorCode.Unauthenticated,
      httpStatusCode: 401,
    });

    authorize.mockResolvedValueOnce({ allowed: false, reason: DenialReason.FORBIDDEN });
    await expect(guard.canActivate(context)).rejects.toMatchObject({
      code: ErrorCode.Forbidden,
      httpStatusCode: 403,
    });

    phase.mockReturnValue(EventPhase.BEFORE);
    authorize.mockResolvedValueOnce({ allowed: false, reason: DenialReason.EVENT_NOT_ACTIVE });
    await expect(guard.canActivate(context)).rejects.toMatchObject({
      code: ErrorCode.EventNotActive,
      resource: 'before',
    });
  });

  it('should let store failures propagate', async () => {
    const { context } = contextFor(Routes.prototype.profile, 'Bearer abc');
    authorize.mockRejectedValue(new DecryptoError({
      code: ErrorCode.StoreUnavailable,
      message: 'User store is temporarily unavailable',
      httpStatusCode: 503,
    }));

    await expect(guard.canActivate(context)).rejects.toMatchObject({
      code: ErrorCode.StoreUnavailable,
    });
  });
});
