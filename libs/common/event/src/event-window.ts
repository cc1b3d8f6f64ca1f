import { ERRORS } from '@decrypto/common/errors';
import { EventPhase, EventWindow } from './event.types';

/**
 * Build the immutable event window. start must be strictly before end.
 */
export function createEventWindow(start: Date, end: Date): EventWindow {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw ERRORS.ConfigurationError('Event window boundaries must be valid dates');
  }
  if (start.getTime() >= end.getTime()) {
    throw ERRORS.ConfigurationError('Event end must be a later point in time than event start');
  }

  return Object.freeze({
    start: new Date(start.getTime()),
    end: new Date(end.getTime()),
  });
}

/**
 * Window is closed at start and open at end: [start, end)
 */
export function resolvePhase(window: EventWindow, now: Date): EventPhase {
  const t = now.getTime();

  if (t < window.start.getTime()) {
    return EventPhase.BEFORE;
  }
  if (t < window.end.getTime()) {
    return EventPhase.ACTIVE;
  }
  return EventPhase.AFTER;
}
