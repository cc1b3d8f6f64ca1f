import { ConfigService } from '@nestjs/config';
import { PasswordService } from '@decrypto/common/crypto';
import { ERRORS } from '@decrypto/common/errors';
import { UserRole } from '@decrypto/common/types';
import { InMemoryUserStore } from '../../../../test/support/in-memory-user-store';
import { FirstSuperuserInitializer } from './first-superuser.initializer';

describe('FirstSuperuserInitializer', () => {
  const config = new ConfigService({
    firstSuperuser: {
      email: 'abc@example.com',
      username: 'admin',
      password: 'test-password',
      fullName: 'Event Admin',
    },
  });
  const passwordService = new PasswordService(
    new ConfigService({ passwordHashing: { timeCost: 2, memoryCost: 4096, parallelism: 1 } }),
  );

  let store: InMemoryUserStore;
  let initializer: FirstSuperuserInitializer;

  beforeEach(() => {
    store = new InMemoryUserStore();
    initializer = new FirstSuperuserInitializer(store, passwordService, config);
  });

  it('should create an active superuser on first start', async () => {
    await initializer.onModuleInit();

    const superuser = await store.findByEmail('abc@example.com');
    expect(superuser).toMatchObject({
      username: 'admin',
      full_name: 'Event Admin',
      role: UserRole.SUPERUSER,
      is_active: true,
    });
    await expect(
      passwordService.verify('test-password', superuser?.password_hash ?? ''),
    ).resolves.toBe(true);
  });

  it('should be idempotent', async () => {
    await expect(initializer.ensureFirstSuperuser()).resolves.toBe(true);
    const first = await store.findByEmail('abc@example.com');

    await expect(initializer.ensureFirstSuperuser()).resolves.toBe(false);

    expect(store.size).toBe(1);
    await expect(store.findByEmail('abc@example.com')).resolves.toEqual(first);
  });

  it('should treat a concurrent creation as present', async () => {
    jest.spyOn(store, 'create').mockRejectedValue(ERRORS.UserAlreadyExists('email'));

    await expect(initializer.ensureFirstSuperuser()).resolves.toBe(false);
  });

  it('should abort startup on other store failures', async () => {
    const failure = new Error('connection refused');
    jest.spyOn(store, 'findByEmail').mockRejectedValue(failure);

    await expect(initializer.onModuleInit()).rejects.toBe(failure);
  });
});
