/**
 * Wall-clock source shared by token issuance/validation and event phase
 * resolution, so both always agree on "now".
 */

export const CLOCK = Symbol('CLOCK');

export interface Clock {
  now(): Date;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
