/**
 * Bound a store operation by a deadline.
 * On expiry the caller gets DatabaseTimeout; the operation itself is not
 * cancelled, its late result is discarded.
 */

import { ERRORS } from '@decrypto/common/errors';

export async function withDeadline<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(ERRORS.DatabaseTimeout(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
