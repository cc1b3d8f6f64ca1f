import { SetMetadata } from '@nestjs/common';
import { AccessPolicy } from '../access-policy';

export const ACCESS_POLICY_KEY = 'decrypto:access-policy';

/**
 * Attach the access policy enforced by AccessGuard
 */
export const Access = (policy: AccessPolicy) => SetMetadata(ACCESS_POLICY_KEY, policy);
