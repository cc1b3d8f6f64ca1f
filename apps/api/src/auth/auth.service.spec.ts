import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { PasswordService } from '@decrypto/common/crypto';
import { TokenService } from '@decrypto/common/jwt';
import { ErrorCode } from '@decrypto/common/errors';
import { Identity, UserRole } from '@decrypto/common/types';
import { FixedClock } from '../../../../test/support/fixed-clock';
import { InMemoryUserStore } from '../../../../test/support/in-memory-user-store';
import { AuthService } from './auth.service';

describe('AuthService', () => {
  const lowCost = { timeCost: 2, memoryCost: 4096, parallelism: 1 };
  const passwordService = new PasswordService(new ConfigService({ passwordHashing: lowCost }));

  let store: InMemoryUserStore;
  let tokens: TokenService;
  let service: AuthService;
  let player: Identity;

  beforeEach(async () => {
    store = new InMemoryUserStore();
    tokens = new TokenService(
      new NestJwtService({ secret: 'test-secret', signOptions: { algorithm: 'HS256' } }),
      new ConfigService({ accessTokenTtlSeconds: 3600 }),
      new FixedClock('2021-12-25T00:00:00Z'),
    );
    service = new AuthService(store, passwordService, tokens);

    player = await store.create({
      email: 'player@example.com',
      username: 'player',
      full_name: 'Player One',
      password_hash: await passwordService.hash('test-password'),
      role: UserRole.REGULAR,
      is_active: true,
    });
  });

  it('should issue a bearer token for valid credentials', async () => {
    const response = await service.login({
      email: 'player@example.com',
      password: 'test-password',
    });

    expect(response.token_type).toBe('bearer');
    expect(response.expires_in).toBe(3600);
    expect(tokens.validate(response.access_token)).toMatchObject({
      valid: true,
      subject: player.id,
    });
  });

  it.each([
    ['an unknown email', 'nobody@example.com', 'test-password'],
    ['a wrong password', 'player@example.com', 'wrong-password'],
  ])('should reject %s as invalid credentials', async (_case, email, password) => {
    await expect(service.login({ email, password })).rejects.toMatchObject({
      code: ErrorCode.InvalidCredentials,
      httpStatusCode: 401,
    });
  });

  it('should run a password verification for unknown emails too', async () => {
    const verify = jest.spyOn(passwordService, 'verify');

    await expect(
      service.login({ email: 'nobody@example.com', password: 'test-password' }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidCredentials });
    await expect(
      service.login({ email: 'nobody@example.com', password: 'other-password' }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidCredentials });

    expect(verify).toHaveBeenCalledTimes(2);
    expect(verify.mock.calls[0][0]).toBe('test-password');
    expect(verify.mock.calls[0][1].startsWith('$argon2id$v=19$m=4096,t=2,p=1$')).toBe(true);
    expect(verify.mock.calls[1][1]).toBe(verify.mock.calls[0][1]);
    verify.mockRestore();
  });

  it('should reject a deactivated account like a wrong password', async () => {
    await store.setActive(player.id, false);

    await expect(
      service.login({ email: 'player@example.com', password: 'test-password' }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidCredentials });
  });

  it('should upgrade a hash made with outdated parameters', async () => {
    const outdated = new PasswordService(
      new ConfigService({ passwordHashing: { ...lowCost, memoryCost: 8192 } }),
    );
    await store.updatePasswordHash(player.id, await outdated.hash('test-password'));

    await service.login({ email: 'player@example.com', password: 'test-password' });

    const stored = await store.findById(player.id);
    expect(stored?.password_hash.startsWith('$argon2id$v=19$m=4096,t=2,p=1$')).toBe(true);
    await expect(passwordService.verify('test-password', stored?.password_hash ?? '')).resolves.toBe(
      true,
    );
  });

  it('should leave a current hash untouched', async () => {
    const updatePasswordHash = jest.spyOn(store, 'updatePasswordHash');

    await service.login({ email: 'player@example.com', password: 'test-password' });

    expect(updatePasswordHash).not.toHaveBeenCalled();
  });

  it('should surface an unparseable stored hash', async () => {
    await store.updatePasswordHash(player.id, '$argon2id$v=19$broken');

    await expect(
      service.login({ email: 'player@example.com', password: 'test-password' }),
    ).rejects.toMatchObject({ code: ErrorCode.MalformedHash });
  });

  it('should refresh a token for the caller', () => {
    const response = service.refresh(player);

    expect(response.expires_in).toBe(3600);
    expect(tokens.validate(response.access_token)).toMatchObject({
      valid: true,
      subject: player.id,
    });
  });
});
