/**
 * What an operation requires from its caller
 */
export interface AccessPolicy {
  /** Callers without a token are admitted */
  readonly anonymous: boolean;
  /** Only superusers are admitted */
  readonly superuser: boolean;
  /** Non-superusers are admitted only during the active phase */
  readonly activeEvent: boolean;
}

export const POLICIES = {
  PUBLIC: { anonymous: true, superuser: false, activeEvent: false },
  AUTHENTICATED: { anonymous: false, superuser: false, activeEvent: false },
  SUPERUSER: { anonymous: false, superuser: true, activeEvent: false },
  ACTIVE_EVENT: { anonymous: false, superuser: false, activeEvent: true },
} as const satisfies Record<string, AccessPolicy>;

export enum DenialReason {
  UNAUTHENTICATED = 'Unauthenticated',
  FORBIDDEN = 'Forbidden',
  EVENT_NOT_ACTIVE = 'EventNotActive',
}
