/**
 * Event window and phase types
 */

export enum EventPhase {
  BEFORE = 'before',
  ACTIVE = 'active',
  AFTER = 'after',
}

export interface EventWindow {
  readonly start: Date;
  readonly end: Date;
}

export const EVENT_WINDOW = Symbol('EVENT_WINDOW');
